/**
 * Engine Module
 *
 * Turn-taking, routing, adjudication and the orchestrating state machine.
 */

export { createInitialState, DebateEngine, type DebateOptions } from './DebateEngine'
export { DEBATE_GRAPH, type GraphEdge, renderMermaid, saveDiagram } from './diagram'
export { EMPTY_HISTORY, formatHistory, speakerAt } from './history'
export { Judge, parseVerdict, VERDICT_FALLBACK } from './Judge'
export { JUDGE_PROMPT, PERSONA_PROMPTS } from './prompts'
export { DEBATE_ROUNDS, route } from './router'
export { opponentOf, REPETITION_FILLER, TurnEngine } from './TurnEngine'

export {
  type DebateEngineConfig,
  type DebateEvent,
  type DebateNode,
  type DebatePhase,
  type DebateState,
  type Persona,
  type Route,
  type Router,
  type TurnResult,
  type Utterance,
  type Verdict,
} from './types'
