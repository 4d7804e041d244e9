import type { ContextEntry } from '../types.js'

/** Render a role prompt followed by its explicit context sections. */
export function buildRolePrompt(prompt: string, context: ContextEntry[] = []): string {
  const sections = [prompt]

  for (const entry of context) {
    if (!entry.content.trim()) continue
    sections.push(`${entry.label}\n${entry.content}`)
  }

  return sections.join('\n\n')
}
