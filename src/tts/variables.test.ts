import { describe, it, expect } from 'vitest'
import { chineseTime, expandVariables } from './variables.js'

function at(hour: number, minute: number): Date {
  return new Date(2026, 0, 15, hour, minute)
}

describe('chineseTime', () => {
  it.each([
    [at(7, 30), '現在時間是早上7點30分'],
    [at(12, 0), '現在時間是中午12點整'],
    [at(15, 5), '現在時間是下午3點5分'],
    [at(20, 0), '現在時間是晚上8點整'],
    [at(23, 45), '現在時間是深夜11點45分'],
    [at(0, 10), '現在時間是深夜12點10分'],
    [at(4, 0), '現在時間是深夜4點整'],
  ])('formats %s', (date, expected) => {
    expect(chineseTime(date)).toBe(expected)
  })
})

describe('expandVariables', () => {
  it('replaces every $TIME occurrence', () => {
    expect(expandVariables('$TIME，$TIME', at(15, 5))).toBe('現在時間是下午3點5分，現在時間是下午3點5分')
  })

  it('leaves text without variables alone', () => {
    expect(expandVariables('你好', at(15, 5))).toBe('你好')
  })
})
