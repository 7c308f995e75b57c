#!/usr/bin/env node
import path from 'path'
import { createBackend, loadEnv, readEnvSettings } from './env'
import { mergeConfig, type ConfigOverrides } from './imrad/config'
import { loadDocument } from './imrad/input'
import { PatternStore } from './imrad/patternStore'
import { runImradPipeline } from './imrad/pipeline'
import { nodeTypeSchema } from './imrad/schemas'
import type { RunSummary } from './imrad/types'
import { ruleBasedAugmenter } from './imrad/augment'

export interface ParsedArgs {
  positionals: string[]
  flags: Set<string>
  options: Map<string, string>
}

const VALUE_OPTIONS = new Set(['--store'])

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], flags: new Set(), options: new Map() }
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[i + 1]
      if (value === undefined) throw new Error(`${arg} needs a value`)
      parsed.options.set(arg, value)
      i++
    } else if (arg.startsWith('--')) {
      parsed.flags.add(arg)
    } else {
      parsed.positionals.push(arg)
    }
  }
  return parsed
}

function storePath(args: ParsedArgs, overrides: ConfigOverrides) {
  const explicit = args.options.get('--store')
  return explicit ? path.resolve(explicit) : mergeConfig(overrides).patternStorePath
}

export function formatSummary(s: RunSummary) {
  const types = Object.entries(s.nodesByType)
    .map(([t, n]) => `${t}=${n}`)
    .join(' ')
  const edges = Object.entries(s.edgesByType)
    .filter(([, n]) => n > 0)
    .map(([t, n]) => `${t}=${n}`)
    .join(' ')
  return [
    `document ${s.documentId} (${s.runId}): ${s.sentences} sentence(s)`,
    `  nodes: ${types}`,
    `  edges: ${edges || 'none'}`,
    `  duplicates removed: ${s.duplicatesRemoved}`,
    `  fallback: ${s.fallbackCalls} call(s), ${s.fallbackAccepted} accepted, ${s.unverified} unverified`,
    `  learned cues: ${s.learnedCues}${s.patternStorePersisted ? '' : ' (not persisted)'}`
  ].join('\n')
}

async function cmdExtract(args: ParsedArgs) {
  const [input, outDir] = args.positionals
  if (!input || !outDir) {
    throw new Error('Usage: extract <input.txt|input.csv|input.json> <outDir> [--no-fallback] [--no-learn] [--semantic] [--store <path>]')
  }
  const settings = readEnvSettings()
  const overrides: ConfigOverrides = {
    ...settings.overrides,
    fallback: { ...settings.overrides.fallback, ...(args.flags.has('--no-fallback') ? { enabled: false } : {}) },
    learning: args.flags.has('--no-learn') ? { enabled: false } : undefined
  }
  const store = await PatternStore.load(storePath(args, overrides))
  const doc = await loadDocument(input)
  const result = await runImradPipeline(doc, {
    config: overrides,
    store,
    backend: createBackend(settings),
    augmenter: args.flags.has('--semantic') ? ruleBasedAugmenter : undefined,
    exportDir: outDir
  })
  console.log(formatSummary(result.summary))
  if (result.exports) {
    console.log('Exports written:')
    for (const p of Object.values(result.exports)) console.log('  ' + p)
  }
}

async function cmdPatterns(args: ParsedArgs) {
  const [, action, pattern, type] = args.positionals
  const settings = readEnvSettings()
  const store = await PatternStore.load(storePath(args, settings.overrides))

  if (action === 'list' || action === undefined) {
    const entries = store.snapshot()
    for (const e of entries) console.log(`${e.type}\t${e.pattern}\t${e.run_id}\t${e.timestamp}`)
    console.log(`${entries.length} pattern(s) in ${store.filePath}`)
    return
  }
  if (action === 'remove') {
    const parsedType = nodeTypeSchema.safeParse(type)
    if (!pattern || !parsedType.success) throw new Error('Usage: patterns remove <pattern> <Hypothesis|Experiment|Dataset|Analysis|Conclusion>')
    if (!store.remove(pattern, parsedType.data)) {
      console.log(`No entry (${pattern}, ${parsedType.data}) in ${store.filePath}`)
      return
    }
    await store.save()
    console.log(`Removed (${pattern}, ${parsedType.data})`)
    return
  }
  throw new Error(`Unknown patterns action: ${action}`)
}

function usage() {
  console.log('Usage: imrad-graph <command> [args]')
  console.log('Commands:')
  console.log('  extract <input.txt|input.csv|input.json> <outDir> [--no-fallback] [--no-learn] [--semantic] [--store <path>]')
  console.log('  patterns list [--store <path>]')
  console.log('  patterns remove <pattern> <type> [--store <path>]')
}

export async function main(argv: string[]): Promise<number> {
  try {
    loadEnv()
    const args = parseArgs(argv)
    const cmd = args.positionals[0]
    if (cmd === 'extract') await cmdExtract({ ...args, positionals: args.positionals.slice(1) })
    else if (cmd === 'patterns') await cmdPatterns(args)
    else {
      usage()
      return 1
    }
    return 0
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err)
    return 1
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).then((code) => process.exit(code))
}
