/**
 * Judge
 *
 * Reviews the full transcript once and extracts a summary, a winner and a
 * justification from the response.
 *
 * @packageDocumentation
 * @module engine/Judge
 */

import type { Provider } from '../providers/types'
import { generate } from './generate'
import { formatHistory } from './history'
import { JUDGE_PROMPT } from './prompts'
import type { DebateState, Verdict } from './types'

/**
 * Used whenever one of the three labels is missing from the judge's output.
 */
export const VERDICT_FALLBACK: Readonly<Verdict> = {
  summary: 'The judge failed to provide a structured summary.',
  winner: 'No winner declared',
  justification: "The judge's output was malformed.",
}

/** Text following the first occurrence of `marker`, up to its next occurrence. */
function after(text: string, marker: string): string | undefined {
  return text.split(marker)[1]
}

/**
 * Parse `SUMMARY:` / `WINNER:` / `JUSTIFICATION:` sections.
 *
 * Best-effort: a summary that itself contains `WINNER:` is cut short. Any
 * missing label yields {@link VERDICT_FALLBACK}; this never throws.
 */
export function parseVerdict(raw: string): Verdict {
  const summary = after(raw, 'SUMMARY:')?.split('WINNER:')[0]
  const winner = after(raw, 'WINNER:')?.split('JUSTIFICATION:')[0]
  const justification = after(raw, 'JUSTIFICATION:')

  if (summary === undefined || winner === undefined || justification === undefined) {
    return { ...VERDICT_FALLBACK }
  }

  return {
    summary: summary.trim(),
    winner: winner.trim(),
    justification: justification.trim(),
  }
}

export class Judge {
  private provider: Provider

  constructor(provider: Provider) {
    this.provider = provider
  }

  /**
   * One provider call. Malformed output degrades to the fallback verdict;
   * a provider rejection surfaces as GenerationFailure.
   */
  async adjudicate(state: DebateState): Promise<Verdict> {
    const prompt = JUDGE_PROMPT(state.topic, formatHistory(state.transcript))
    const raw = await generate(this.provider, prompt, 'judge', state.roundNumber)
    return parseVerdict(raw)
  }
}
