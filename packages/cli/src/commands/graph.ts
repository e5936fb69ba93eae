/**
 * Graph Command
 *
 * Print the debate state machine as Mermaid source.
 */

import { renderMermaid } from '@agora/core'

export function graph() {
  console.log(renderMermaid())
}
