#!/usr/bin/env tsx
/**
 * Example: Running a debate using @agora/core
 *
 * Usage:
 *   OPENAI_API_KEY=... npx tsx packages/core/examples/debate.ts
 */

import { DebateEngine, formatHistory, providerFactory } from '../src'

const TOPIC = 'Should humanity prioritize colonizing Mars over repairing Earth?'

async function main() {
  const provider = providerFactory.create('openai', { apiKey: process.env.OPENAI_API_KEY })

  if (!(await provider.isAvailable())) {
    console.log('Set OPENAI_API_KEY to run this example.')
    process.exit(1)
  }

  console.log('Topic:', TOPIC)

  const engine = new DebateEngine()
  const startTime = Date.now()
  const final = await engine.run({ topic: TOPIC, provider })
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1)

  console.log(`\n${formatHistory(final.transcript)}`)
  console.log(`\nWinner: ${final.winner}`)
  console.log(`Summary: ${final.summary}`)
  console.log(`Justification: ${final.justification}`)
  console.log(`\nTime: ${elapsed}s | Rounds: ${final.roundNumber}`)
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
