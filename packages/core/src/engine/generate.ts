import { GenerationFailure } from '../errors'
import type { Provider } from '../providers/types'
import { createLogger } from '../utils/logger'
import type { DebateNode } from './types'

const log = createLogger('generate')

/**
 * Single provider call for a graph node. Rejections are rethrown as
 * GenerationFailure; nothing is retried.
 */
export async function generate(provider: Provider, prompt: string, node: DebateNode, round: number): Promise<string> {
  log.debug(`${node} round ${round} -> ${provider.name}`, { promptLength: prompt.length })

  try {
    const response = await provider.run(prompt)
    log.debug(`${node} round ${round} <- ${provider.name}`, response.metadata)
    return response.content
  } catch (error) {
    throw new GenerationFailure(node, round, error)
  }
}
