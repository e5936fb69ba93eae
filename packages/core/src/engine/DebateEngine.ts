/**
 * Debate Engine
 *
 * Drives the debate graph: the Scientist and the Philosopher alternate turns
 * until the router hands control to the judge, then the run ends.
 *
 * @packageDocumentation
 * @module engine/DebateEngine
 */

import { MaxTurnsExceededError } from '../errors'
import type { Provider } from '../providers/types'
import { Judge } from './Judge'
import { route } from './router'
import { TurnEngine } from './TurnEngine'
import type { DebateEngineConfig, DebateEvent, DebatePhase, DebateState } from './types'

/**
 * Options for running a debate.
 *
 * @example
 * ```typescript
 * const options: DebateOptions = {
 *   topic: 'Should we colonize Mars?',
 *   provider: providerFactory.create('openai'),
 * }
 * ```
 */
export interface DebateOptions {
  /** The topic to debate */
  topic: string
  /** Generates every turn and the verdict */
  provider: Provider
  /** Override engine configuration for this debate */
  config?: Partial<DebateEngineConfig>
}

const DEFAULT_CONFIG: DebateEngineConfig = {
  maxIterations: 15,
  router: route,
}

export function createInitialState(topic: string): DebateState {
  return {
    topic,
    transcript: [],
    roundNumber: 0,
    nextSpeaker: 'Scientist',
  }
}

/**
 * Scientist vs Philosopher debate engine.
 *
 * States move `debating → adjudicating → done`. Every node invocation counts
 * against `maxIterations`; reaching it aborts with MaxTurnsExceededError
 * instead of looping forever.
 *
 * @example Basic usage
 * ```typescript
 * const engine = new DebateEngine()
 * const final = await engine.run({ topic, provider })
 * console.log(final.winner, final.justification)
 * ```
 *
 * @example Streaming progress
 * ```typescript
 * for await (const event of engine.runStreaming({ topic, provider })) {
 *   if (event.type === 'turn_end') {
 *     console.log(`[Round ${event.state.roundNumber}] ${event.utterance.speaker}: ${event.utterance.text}`)
 *   }
 * }
 * ```
 */
export class DebateEngine {
  private config: DebateEngineConfig

  constructor(config: Partial<DebateEngineConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }
  }

  /**
   * Run a complete debate and return the final state, verdict included.
   */
  async run(options: DebateOptions): Promise<DebateState> {
    let state = createInitialState(options.topic)
    for await (const event of this.runStreaming(options)) {
      state = event.state
    }
    return state
  }

  /**
   * Run a debate, yielding an event after every node.
   */
  async *runStreaming(options: DebateOptions): AsyncGenerator<DebateEvent> {
    const config = { ...this.config, ...options.config }
    const turns = new TurnEngine(options.provider)
    const judge = new Judge(options.provider)

    let state = createInitialState(options.topic)
    let phase: DebatePhase = 'debating'
    let iterations = 0

    const step = () => {
      if (iterations >= config.maxIterations) {
        throw new MaxTurnsExceededError(config.maxIterations)
      }
      iterations++
    }

    yield { type: 'debate_start', state, timestamp: Date.now() }

    while (phase !== 'done') {
      switch (phase) {
        case 'debating': {
          if (config.router(state) === 'adjudicate') {
            phase = 'adjudicating'
            break
          }
          step()
          const { utterance, state: next } = await turns.takeTurn(state)
          state = next
          yield { type: 'turn_end', node: 'agent', utterance, state, timestamp: Date.now() }
          break
        }

        case 'adjudicating': {
          step()
          const verdict = await judge.adjudicate(state)
          state = { ...state, ...verdict }
          phase = 'done'
          yield { type: 'judgment', node: 'judge', verdict, state, timestamp: Date.now() }
          break
        }
      }
    }

    yield { type: 'debate_end', state, timestamp: Date.now() }
  }

  /**
   * Get the current configuration
   */
  getConfig(): DebateEngineConfig {
    return { ...this.config }
  }

  /**
   * Update configuration
   */
  setConfig(config: Partial<DebateEngineConfig>): void {
    this.config = { ...this.config, ...config }
  }
}
