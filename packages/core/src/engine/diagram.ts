/**
 * Renders the debate graph as a Mermaid flowchart.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Route } from './types'

export interface GraphEdge {
  from: string
  to: string
  /** Router decision that selects this edge; unconditional when absent */
  when?: Route
}

export const START = '__start__'
export const END = '__end__'

export const DEBATE_GRAPH: { nodes: string[]; edges: GraphEdge[] } = {
  nodes: [START, 'agent', 'judge', END],
  edges: [
    { from: START, to: 'agent' },
    { from: 'agent', to: 'agent', when: 'continue' },
    { from: 'agent', to: 'judge', when: 'adjudicate' },
    { from: 'judge', to: END },
  ],
}

export function renderMermaid(graph = DEBATE_GRAPH): string {
  const lines = ['flowchart TD']

  for (const node of graph.nodes) {
    const terminal = node === START || node === END
    lines.push(terminal ? `  ${node}([${node}])` : `  ${node}(${node})`)
  }

  for (const edge of graph.edges) {
    lines.push(edge.when ? `  ${edge.from} -. ${edge.when} .-> ${edge.to}` : `  ${edge.from} --> ${edge.to}`)
  }

  return lines.join('\n')
}

/**
 * Write the Mermaid source to `path`. Callers treat failure as a warning.
 */
export async function saveDiagram(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${renderMermaid()}\n`, 'utf-8')
}
