import type { Persona, Utterance } from './types'

export const EMPTY_HISTORY = 'The debate has not started yet.'

/**
 * Speaker for a transcript position. Turns strictly alternate and the
 * Scientist opens, so parity alone decides.
 */
export function speakerAt(index: number): Persona {
  return index % 2 === 0 ? 'Scientist' : 'Philosopher'
}

/**
 * Render the transcript as one `[Round n] Speaker: text` line per utterance.
 */
export function formatHistory(transcript: readonly Utterance[]): string {
  if (transcript.length === 0) {
    return EMPTY_HISTORY
  }

  return transcript
    .map((utterance, i) => `[Round ${i + 1}] ${speakerAt(i)}: ${utterance.text}`)
    .join('\n')
    .trim()
}
