import fsp from 'fs/promises'
import path from 'path'
import { exportMermaid } from '../exporters/mermaidExporter'
import { atomicWrite } from '../interfaces/atomicWrite'
import type { EdgeExportRecord, ExportBundle, ImradEdge, ImradGraph, ImradNode, NodeExportRecord, RunSummary } from './types'

export function toNodeRecord(n: ImradNode): NodeExportRecord {
  return {
    id: n.id,
    type: n.type,
    text: n.text,
    section: n.section,
    confidence: n.confidence,
    evidence: [...n.evidence],
    semantic_context: n.semanticContext ? { role: n.semanticContext.role, entities: [...n.semanticContext.entities] } : null,
    timestamp: n.timestamp,
    low_confidence: n.lowConfidence,
    source: n.source
  }
}

export function toEdgeRecord(e: ImradEdge): EdgeExportRecord {
  return {
    start: e.start,
    end: e.end,
    type: e.type,
    confidence: e.confidence,
    semantic_evidence: e.semanticEvidence ?? null
  }
}

function csv(s: string) {
  return '"' + s.replace(/"/g, '""') + '"'
}

export function nodesToCsv(nodes: ImradNode[]) {
  const lines = ['id,type,section,confidence,low_confidence,source,evidence,text,timestamp'].concat(
    nodes.map((n) =>
      [
        csv(n.id),
        csv(n.type),
        csv(n.section),
        n.confidence.toFixed(3),
        String(n.lowConfidence),
        csv(n.source),
        csv(n.evidence.join(';')),
        csv(n.text),
        csv(n.timestamp)
      ].join(',')
    )
  )
  return lines.join('\n') + '\n'
}

export function edgesToCsv(edges: ImradEdge[]) {
  const lines = ['start,end,type,confidence,semantic_evidence'].concat(
    edges.map((e) => `${csv(e.start)},${csv(e.end)},${csv(e.type)},${e.confidence.toFixed(3)},${csv(e.semanticEvidence ?? '')}`)
  )
  return lines.join('\n') + '\n'
}

export async function exportGraphJson(dir: string, base: string, graph: ImradGraph, summary?: RunSummary) {
  await fsp.mkdir(dir, { recursive: true })
  const p = path.join(dir, `${base}.graph.json`)
  const body = { nodes: graph.nodes.map(toNodeRecord), edges: graph.edges.map(toEdgeRecord), ...(summary ? { summary } : {}) }
  await atomicWrite(p, JSON.stringify(body, null, 2) + '\n')
  return p
}

export async function exportCsv(dir: string, base: string, graph: ImradGraph) {
  await fsp.mkdir(dir, { recursive: true })
  const nodesPath = path.join(dir, `${base}.nodes.csv`)
  const edgesPath = path.join(dir, `${base}.edges.csv`)
  await atomicWrite(nodesPath, nodesToCsv(graph.nodes))
  await atomicWrite(edgesPath, edgesToCsv(graph.edges))
  return { nodesPath, edgesPath }
}

const MAX_LABEL = 60

export function mermaidLabel(n: ImradNode) {
  const text = n.text.length > MAX_LABEL ? `${n.text.slice(0, MAX_LABEL - 3)}...` : n.text
  return `${n.type}: ${text}`
}

export function exportGraphMermaid(dir: string, base: string, graph: ImradGraph) {
  return exportMermaid(
    dir,
    base,
    graph.nodes.map((n) => ({ id: n.id, label: mermaidLabel(n) })),
    graph.edges.map((e) => ({ from: e.start, to: e.end, label: e.type }))
  )
}

export async function exportAll(dir: string, base: string, graph: ImradGraph, summary?: RunSummary): Promise<ExportBundle> {
  const graphJsonPath = await exportGraphJson(dir, base, graph, summary)
  const { nodesPath, edgesPath } = await exportCsv(dir, base, graph)
  const mermaidPath = await exportGraphMermaid(dir, base, graph)
  return { graphJsonPath, csvNodesPath: nodesPath, csvEdgesPath: edgesPath, mermaidPath }
}
