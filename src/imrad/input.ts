import { parse } from 'csv-parse/sync'
import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { createLogger } from '../logger'
import { InputError } from './errors'
import { documentInputSchema } from './schemas'
import type { DocumentInput } from './types'

const log = createLogger('input')

export function documentFromText(id: string, text: string, title?: string): DocumentInput {
  return { id, title, spans: [{ text }] }
}

const csvRowSchema = z.object({ section: z.string().optional(), text: z.string() })

/**
 * Extraction-collaborator output: one row per span with `section,text`
 * columns. An empty section cell means "no hint".
 */
export function documentFromCsv(id: string, csvText: string): DocumentInput {
  let records: unknown
  try {
    records = parse(csvText, { columns: true, skip_empty_lines: true, trim: true })
  } catch (err) {
    throw new InputError(`document "${id}": cannot parse CSV: ${err instanceof Error ? err.message : String(err)}`)
  }
  const rows = z.array(csvRowSchema).safeParse(records)
  if (!rows.success) throw new InputError(`document "${id}": CSV needs a "text" column (and optionally "section")`)
  return {
    id,
    spans: rows.data.map((r) => (r.section ? { text: r.text, section: r.section } : { text: r.text }))
  }
}

export function documentFromJson(id: string, jsonText: string): DocumentInput {
  let json: unknown
  try {
    json = JSON.parse(jsonText)
  } catch {
    throw new InputError(`document "${id}": invalid JSON`)
  }
  const parsed = documentInputSchema.safeParse(json)
  if (!parsed.success) throw new InputError(`document "${id}": ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`)
  return parsed.data
}

/** Picks the adapter from the file extension; the id is the file's base name. */
export async function loadDocument(filePath: string): Promise<DocumentInput> {
  const rawExt = path.extname(filePath)
  const ext = rawExt.toLowerCase()
  const id = path.basename(filePath, rawExt)
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf8')
  } catch (err) {
    throw new InputError(`cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
  log.debug('loaded input', filePath, text.length)
  if (ext === '.csv') return documentFromCsv(id, text)
  if (ext === '.json') return documentFromJson(id, text)
  return documentFromText(id, text)
}
