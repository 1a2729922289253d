/**
 * Text variables expanded before speech synthesis
 */

/** Spoken Chinese clock phrase, e.g. 現在時間是下午3點5分 */
export function chineseTime(now: Date): string {
  const hour = now.getHours()
  const minute = now.getMinutes()

  let period: string
  if (hour >= 5 && hour < 12) {
    period = '早上'
  } else if (hour === 12) {
    period = '中午'
  } else if (hour >= 13 && hour < 18) {
    period = '下午'
  } else if (hour >= 18 && hour < 22) {
    period = '晚上'
  } else {
    period = '深夜'
  }

  let displayHour = hour <= 12 ? hour : hour - 12
  if (displayHour === 0) {
    displayHour = 12
  }

  return minute === 0
    ? `現在時間是${period}${displayHour}點整`
    : `現在時間是${period}${displayHour}點${minute}分`
}

export function expandVariables(text: string, now: Date = new Date()): string {
  if (!text.includes('$TIME')) {
    return text
  }
  return text.split('$TIME').join(chineseTime(now))
}
