import { describe, expect, test } from 'vitest'
import { createInitialState } from '../engine/DebateEngine'
import { DEBATE_ROUNDS, route } from '../engine/router'

describe('route', () => {
  test('threshold is eight rounds', () => {
    expect(DEBATE_ROUNDS).toBe(8)
  })

  test('continues for rounds 0 through 7', () => {
    for (let roundNumber = 0; roundNumber < 8; roundNumber++) {
      expect(route({ ...createInitialState('topic'), roundNumber })).toBe('continue')
    }
  })

  test('adjudicates from round 8 onwards', () => {
    for (const roundNumber of [8, 9, 15, 100]) {
      expect(route({ ...createInitialState('topic'), roundNumber })).toBe('adjudicate')
    }
  })
})
