/**
 * Turn Engine
 *
 * Produces the next utterance for whichever persona holds the floor.
 *
 * @packageDocumentation
 * @module engine/TurnEngine
 */

import type { Provider } from '../providers/types'
import { generate } from './generate'
import { formatHistory } from './history'
import { PERSONA_PROMPTS } from './prompts'
import type { DebateState, Persona, TurnResult, Utterance } from './types'

/**
 * Substituted when the provider returns an exact copy of an earlier utterance.
 */
export const REPETITION_FILLER = 'I will restate my previous point to emphasize its importance.'

export function opponentOf(persona: Persona): Persona {
  return persona === 'Scientist' ? 'Philosopher' : 'Scientist'
}

/**
 * Runs one debate turn per call.
 *
 * The repetition guard only catches verbatim, case-sensitive repeats of a
 * whole earlier utterance. Paraphrases and partial repeats pass through.
 *
 * @example
 * ```typescript
 * const turns = new TurnEngine(provider)
 * const { utterance, state: next } = await turns.takeTurn(createInitialState('Is free will real?'))
 * console.log(`${utterance.speaker}: ${utterance.text}`)
 * ```
 */
export class TurnEngine {
  private provider: Provider

  constructor(provider: Provider) {
    this.provider = provider
  }

  async takeTurn(state: DebateState): Promise<TurnResult> {
    const speaker = state.nextSpeaker
    const prompt = PERSONA_PROMPTS[speaker](state.topic, formatHistory(state.transcript))
    const round = state.roundNumber + 1

    const generated = await generate(this.provider, prompt, 'agent', round)
    const repeated = state.transcript.some((previous) => previous.text === generated)

    const utterance: Utterance = { speaker, text: repeated ? REPETITION_FILLER : generated }

    return {
      utterance,
      state: {
        ...state,
        transcript: [...state.transcript, utterance],
        roundNumber: round,
        nextSpeaker: opponentOf(speaker),
      },
    }
  }
}
