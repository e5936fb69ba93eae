/**
 * Judge Tests
 */

import { describe, expect, test } from 'vitest'
import { createInitialState } from '../engine/DebateEngine'
import { Judge, parseVerdict, VERDICT_FALLBACK } from '../engine/Judge'
import type { DebateState } from '../engine/types'
import { GenerationFailure } from '../errors'
import { FailingProvider, MockProvider } from './mocks'

const debated: DebateState = {
  ...createInitialState('Can machines think?'),
  transcript: [
    { speaker: 'Scientist', text: 'Benchmarks show rising capability.' },
    { speaker: 'Philosopher', text: 'Capability is not understanding.' },
  ],
  roundNumber: 2,
}

describe('parseVerdict', () => {
  test('extracts the three labelled sections', () => {
    expect(parseVerdict('SUMMARY: S\nWINNER: W\nJUSTIFICATION: J')).toEqual({
      summary: 'S',
      winner: 'W',
      justification: 'J',
    })
  })

  test('trims surrounding whitespace and keeps inner newlines', () => {
    const raw = 'SUMMARY:   Both sides engaged.\nThey disagreed on method.  \n\nWINNER:  Scientist \nJUSTIFICATION:\n  Stronger evidence.\n'

    expect(parseVerdict(raw)).toEqual({
      summary: 'Both sides engaged.\nThey disagreed on method.',
      winner: 'Scientist',
      justification: 'Stronger evidence.',
    })
  })

  test('ignores text before the first label', () => {
    const raw = 'Here is my verdict.\nSUMMARY: Close.\nWINNER: Philosopher\nJUSTIFICATION: Sharper framing.'

    expect(parseVerdict(raw)).toEqual({
      summary: 'Close.',
      winner: 'Philosopher',
      justification: 'Sharper framing.',
    })
  })

  test('passes a free-form winner through unchanged', () => {
    expect(parseVerdict('SUMMARY: s\nWINNER: Both, arguably\nJUSTIFICATION: j').winner).toBe('Both, arguably')
  })

  test('a summary containing a label is cut at that label', () => {
    const raw = 'SUMMARY: The WINNER: is unclear\nWINNER: Scientist\nJUSTIFICATION: ok'

    expect(parseVerdict(raw)).toEqual({
      summary: 'The',
      winner: 'is unclear',
      justification: 'ok',
    })
  })

  test('falls back when no labels are present', () => {
    expect(parseVerdict('The Scientist clearly won this one.')).toEqual({
      summary: 'The judge failed to provide a structured summary.',
      winner: 'No winner declared',
      justification: "The judge's output was malformed.",
    })
  })

  test('falls back when any single label is missing', () => {
    expect(parseVerdict('SUMMARY: s\nWINNER: w')).toEqual(VERDICT_FALLBACK)
    expect(parseVerdict('SUMMARY: s\nJUSTIFICATION: j')).toEqual(VERDICT_FALLBACK)
    expect(parseVerdict('WINNER: w\nJUSTIFICATION: j')).toEqual(VERDICT_FALLBACK)
    expect(parseVerdict('')).toEqual(VERDICT_FALLBACK)
  })

  test('returns a fresh fallback object each time', () => {
    const verdict = parseVerdict('nothing structured')
    verdict.winner = 'changed'

    expect(VERDICT_FALLBACK.winner).toBe('No winner declared')
  })
})

describe('Judge', () => {
  test('calls the provider once with topic and full transcript', async () => {
    const provider = new MockProvider('judge', ['SUMMARY: s\nWINNER: Philosopher\nJUSTIFICATION: j'])
    const judge = new Judge(provider)

    const verdict = await judge.adjudicate(debated)

    expect(verdict).toEqual({ summary: 's', winner: 'Philosopher', justification: 'j' })
    expect(provider.getCallCount()).toBe(1)

    const prompt = provider.prompts[0]
    expect(prompt).toContain("on the topic: 'Can machines think?'")
    expect(prompt).toContain(
      '[Round 1] Scientist: Benchmarks show rising capability.\n[Round 2] Philosopher: Capability is not understanding.',
    )
    expect(prompt).toContain('SUMMARY: [Your summary here]')
  })

  test('malformed output degrades to the fallback without throwing', async () => {
    const judge = new Judge(new MockProvider('judge', ['I cannot decide.']))

    await expect(judge.adjudicate(debated)).resolves.toEqual(VERDICT_FALLBACK)
  })

  test('provider rejection surfaces as GenerationFailure', async () => {
    const judge = new Judge(new FailingProvider())

    const error = await judge.adjudicate(debated).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(GenerationFailure)
    if (!(error instanceof GenerationFailure)) return
    expect(error.node).toBe('judge')
    expect(error.round).toBe(2)
  })
})
