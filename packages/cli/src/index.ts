#!/usr/bin/env tsx
/**
 * Agora CLI
 *
 * Run a Scientist vs Philosopher debate from the command line.
 *
 * Usage:
 *   agora debate "Is consciousness computable?"
 *   agora debate --provider anthropic
 *   agora graph
 */

import 'dotenv/config'
import { debate } from './commands/debate'
import { graph } from './commands/graph'

const HELP = `
Agora - Scientist vs Philosopher Debate CLI

Usage:
  agora <command> [options]

Commands:
  debate [topic]    Run a debate (asks for the topic when omitted)
  graph             Print the debate graph as a Mermaid flowchart

Options:
  -h, --help        Show this help message
  -v, --version     Show version

Examples:
  agora debate "Should gene editing in humans be allowed?"
  agora debate --provider anthropic --log-file logs/run.txt
  agora graph > debate.mmd
`

async function main() {
  const args = process.argv.slice(2)

  if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
    console.log(HELP)
    process.exit(0)
  }

  if (args[0] === '-v' || args[0] === '--version') {
    console.log('agora v0.1.0')
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'debate':
      await debate(args.slice(1))
      break
    case 'graph':
      graph()
      break
    default:
      console.error(`Unknown command: ${command}`)
      console.log(HELP)
      process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
