/**
 * Speech Module
 *
 * Audio preparation for playback: text-to-speech, voice conversion,
 * variable expansion.
 */

export { SpeechSynthesizer, runCommand, MIN_AUDIO_BYTES } from './speech.js'
export { expandVariables, chineseTime } from './variables.js'

export type { AudioPreparer, CommandRunner, SpeechOptions } from './speech.js'
