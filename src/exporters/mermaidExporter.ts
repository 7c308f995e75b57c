import fsp from 'fs/promises'
import path from 'path'
import { atomicWrite } from '../interfaces/atomicWrite'

export interface MermaidNode {
  id: string
  label: string
}

export interface MermaidRelationship {
  from: string
  to: string
  label: string
}

function sanitizeId(s: string) {
  return s.replace(/[^a-zA-Z0-9_]+/g, '_').replace(/^_+|_+$/g, '') || 'N'
}

const quote = (s: string) => s.replace(/"/g, '#quot;').replace(/\s+/g, ' ')

/**
 * Builds a Mermaid flowchart definition from the given nodes and relationships.
 * Relationships whose endpoints are not among the nodes are skipped.
 */
export function buildMermaid(nodes: MermaidNode[], relationships: MermaidRelationship[]) {
  const seen = new Set<string>()
  const nodeLines: string[] = []
  for (const n of nodes) {
    const id = sanitizeId(n.id)
    if (seen.has(id)) continue
    seen.add(id)
    nodeLines.push(`  ${id}["${quote(n.label)}"]`)
  }

  const edgeLines: string[] = []
  for (const rel of relationships) {
    const from = sanitizeId(rel.from)
    const to = sanitizeId(rel.to)
    if (!seen.has(from) || !seen.has(to)) continue
    edgeLines.push(`  ${from} -- "${quote(rel.label)}" --> ${to}`)
  }

  return ['graph TD', ...nodeLines, ...edgeLines].join('\n') + '\n'
}

/** Writes `<baseName>.mmd`; rendering to an image is left to external tools. */
export async function exportMermaid(dir: string, baseName: string, nodes: MermaidNode[], relationships: MermaidRelationship[]) {
  await fsp.mkdir(dir, { recursive: true })
  const outPath = path.join(dir, `${baseName}.mmd`)
  await atomicWrite(outPath, buildMermaid(nodes, relationships))
  return outPath
}

export default exportMermaid
