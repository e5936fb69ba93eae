/**
 * Debate Command
 *
 * Run a Scientist vs Philosopher debate and print the judge's verdict.
 */

import { writeFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import {
  type AgoraConfig,
  assertCredentials,
  type ConfigLayer,
  ConfigurationError,
  createLogger,
  DebateEngine,
  type DebateState,
  GenerationFailure,
  loadConfig,
  MaxTurnsExceededError,
  type Persona,
  providerFactory,
  saveDiagram,
  SessionLogger,
  type SessionLoggerInstance,
} from '@agora/core'
import * as p from '@clack/prompts'

const HELP = `
Usage: agora debate [topic] [options]

Arguments:
  topic                   The topic to debate (asked for interactively when omitted)

Options:
  -c, --config <path>     YAML configuration file
  -p, --provider <name>   Provider: openai, anthropic, google (default: openai)
  -m, --model <id>        Model override
  -l, --log-file <path>   Run log (default: debate_log.txt, overwritten each run)
  -d, --diagram <path>    Mermaid diagram output (default: debate_dag.mmd)
  -o, --output <path>     Save the final state to file (JSON)
  -h, --help              Show this help message

Examples:
  agora debate "Is free will an illusion?"
  agora debate "Topic" --provider anthropic
  agora debate "Topic" --output result.json
`

// ANSI colors
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
}

const log = createLogger('cli')

function getSpeakerColor(speaker: Persona): string {
  return speaker === 'Scientist' ? colors.cyan : colors.magenta
}

export async function debate(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
      provider: { type: 'string', short: 'p' },
      model: { type: 'string', short: 'm' },
      'log-file': { type: 'string', short: 'l' },
      diagram: { type: 'string', short: 'd' },
      output: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  })

  if (values.help) {
    console.log(HELP)
    return
  }

  const overrides: ConfigLayer = {}
  if (values.provider) overrides.provider = values.provider
  if (values.model) overrides.settings = { model: values.model }
  if (values['log-file'] || values.diagram) {
    overrides.output = {}
    if (values['log-file']) overrides.output.logFile = values['log-file']
    if (values.diagram) overrides.output.diagramFile = values.diagram
  }

  let config: AgoraConfig
  let sessionLog: SessionLoggerInstance
  try {
    config = await loadConfig({ path: values.config, overrides })
    sessionLog = await SessionLogger.create({ path: config.output.logFile })
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(`FATAL: ${error.message}`, error.cause)
      process.exitCode = 1
      return
    }
    throw error
  }

  try {
    try {
      assertCredentials(config)
    } catch (error) {
      if (error instanceof ConfigurationError) {
        sessionLog.error(`FATAL: ${error.message}`)
        log.error(`FATAL: ${error.message}`)
        process.exitCode = 1
        return
      }
      throw error
    }

    p.intro(`${colors.bold}Agora - Scientist vs Philosopher${colors.reset}`)

    let topic = positionals.join(' ')
    if (!topic) {
      const answer = await p.text({ message: 'Enter the topic for the debate' })
      if (p.isCancel(answer)) {
        p.cancel('Cancelled')
        return
      }
      topic = answer
    }
    sessionLog.info(`Debate Topic: ${topic}`)

    await writeDiagram(config.output.diagramFile, sessionLog)

    const final = await runDebate(config, topic, sessionLog)
    if (!final) return

    printJudgment(final, sessionLog)

    if (values.output) {
      await writeFile(values.output, JSON.stringify(final, null, 2))
      console.log(`\n${colors.green}✓${colors.reset} Results saved to ${values.output}`)
    }

    console.log(`\n${colors.dim}Full debate log saved to ${sessionLog.path}${colors.reset}`)
  } finally {
    await sessionLog.close()
  }
}

async function writeDiagram(path: string, sessionLog: SessionLoggerInstance) {
  try {
    await saveDiagram(path)
    sessionLog.info(`DAG diagram saved to ${path}`)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    log.warn(`Could not generate DAG diagram: ${reason}`)
    sessionLog.warn(`Could not generate DAG diagram: ${reason}`)
  }
}

/**
 * Stream the debate to the console and the run log. Returns undefined when
 * the run was aborted; the reason has already been reported.
 */
async function runDebate(
  config: AgoraConfig,
  topic: string,
  sessionLog: SessionLoggerInstance,
): Promise<DebateState | undefined> {
  const settings = config.providers[config.provider]
  const provider = providerFactory.create(config.provider, {
    ...settings,
    model: config.settings.model ?? settings?.model,
    temperature: config.settings.temperature,
  })
  const engine = new DebateEngine({ maxIterations: config.settings.maxIterations })

  console.log(`\n${colors.bold}Starting debate between Scientist and Philosopher...${colors.reset}\n`)
  sessionLog.info('Starting debate flow...')

  let final: DebateState | undefined

  try {
    for await (const event of engine.runStreaming({ topic, provider })) {
      switch (event.type) {
        case 'turn_end': {
          sessionLog.transition(event.node, event.state)
          const { speaker, text } = event.utterance
          console.log(
            `${getSpeakerColor(speaker)}[Round ${event.state.roundNumber}] ${speaker}:${colors.reset} ${text}`,
          )
          break
        }

        case 'judgment':
          sessionLog.transition(event.node, event.state)
          break

        case 'debate_end':
          final = event.state
          break
      }
    }
  } catch (error) {
    if (error instanceof GenerationFailure || error instanceof MaxTurnsExceededError) {
      const headline = error instanceof GenerationFailure ? 'debate aborted: generation failure' : 'debate aborted'
      console.error(`\n${colors.red}${headline}${colors.reset}: ${error.message}`)
      sessionLog.error(`${headline}: ${error.message}`)
      process.exitCode = 1
      return undefined
    }
    throw error
  }

  return final
}

function printJudgment(final: DebateState, sessionLog: SessionLoggerInstance) {
  console.log(`\n${colors.bold}━━━ Debate Concluded ━━━${colors.reset}`)
  sessionLog.info('--- DEBATE CONCLUDED ---')

  console.log(`\n${colors.yellow}[Judge] Summary of debate:${colors.reset}`)
  console.log(final.summary)
  console.log(`\n${colors.yellow}[Judge] Winner:${colors.reset} ${final.winner}`)
  console.log(`${colors.yellow}[Judge] Reason:${colors.reset} ${final.justification}`)

  sessionLog.info(`Final Summary: ${final.summary}`)
  sessionLog.info(`Winner: ${final.winner}`)
  sessionLog.info(`Justification: ${final.justification}`)

  p.outro('Done!')
}
