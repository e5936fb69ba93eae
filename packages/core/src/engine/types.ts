/**
 * Debate Engine Types
 *
 * Core type definitions for the Scientist vs Philosopher debate.
 *
 * @packageDocumentation
 * @module engine/types
 */

/**
 * The two fixed debaters. The Scientist always opens.
 */
export type Persona = 'Scientist' | 'Philosopher'

/**
 * A single argument made by one persona.
 *
 * @example
 * ```typescript
 * const utterance: Utterance = {
 *   speaker: 'Scientist',
 *   text: 'Controlled trials show a measurable effect.',
 * }
 * ```
 */
export interface Utterance {
  readonly speaker: Persona
  readonly text: string
}

/**
 * State threaded through every node of the debate graph.
 *
 * Nodes never mutate a state; they return a new one. The transcript is
 * append-only and `roundNumber` always equals its length.
 */
export interface DebateState {
  /** The topic under debate */
  readonly topic: string
  /** Every utterance so far, in debate order */
  readonly transcript: readonly Utterance[]
  /** Number of turns taken */
  readonly roundNumber: number
  /** Persona that speaks next */
  readonly nextSpeaker: Persona
  /** Set by the judge */
  readonly summary?: string
  /** Set by the judge. Free-form model text, not necessarily a persona name */
  readonly winner?: string
  /** Set by the judge */
  readonly justification?: string
}

/**
 * Output of the adjudication step.
 */
export interface Verdict {
  summary: string
  winner: string
  justification: string
}

/**
 * Result of one TurnEngine call.
 */
export interface TurnResult {
  utterance: Utterance
  state: DebateState
}

/**
 * Router decision after each turn.
 */
export type Route = 'continue' | 'adjudicate'

export type Router = (state: DebateState) => Route

/**
 * Orchestrator phases.
 *
 * - `debating`: personas alternate turns until the router says otherwise
 * - `adjudicating`: the judge reviews the transcript once
 * - `done`: terminal
 */
export type DebatePhase = 'debating' | 'adjudicating' | 'done'

/** Graph nodes that do work. */
export type DebateNode = 'agent' | 'judge'

/**
 * Events emitted while a debate runs.
 *
 * Event flow:
 * 1. `debate_start` - initial state
 * 2. `turn_end` - once per turn (8 in a normal run)
 * 3. `judgment` - once, after the last turn
 * 4. `debate_end` - final state
 */
export type DebateEvent =
  | { type: 'debate_start'; state: DebateState; timestamp: number }
  | { type: 'turn_end'; node: 'agent'; utterance: Utterance; state: DebateState; timestamp: number }
  | { type: 'judgment'; node: 'judge'; verdict: Verdict; state: DebateState; timestamp: number }
  | { type: 'debate_end'; state: DebateState; timestamp: number }

/**
 * Configuration options for the DebateEngine.
 *
 * @example
 * ```typescript
 * const config: DebateEngineConfig = {
 *   maxIterations: 15,
 *   router: route,
 * }
 * ```
 */
export interface DebateEngineConfig {
  /** Hard ceiling on node invocations per run (default: 15) */
  maxIterations: number
  /** Decides after each turn whether to keep debating (default: `route`) */
  router: Router
}
