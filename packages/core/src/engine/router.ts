import type { DebateState, Route } from './types'

/** Total turns before adjudication: four per persona. */
export const DEBATE_ROUNDS = 8

export function route(state: DebateState): Route {
  return state.roundNumber >= DEBATE_ROUNDS ? 'adjudicate' : 'continue'
}
