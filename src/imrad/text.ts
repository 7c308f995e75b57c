import { z } from 'zod'
import stopwordList from './stopwords.json'

const STOPWORDS = new Set(z.array(z.string()).parse(stopwordList))

export const isStopword = (token: string) => STOPWORDS.has(token)

/** Lower-cased word tokens; punctuation other than inner hyphens is dropped. */
export function tokenize(text: string) {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/\s+/)
    .map((t) => t.replace(/^-+|-+$/g, ''))
    .filter(Boolean)
}

export const isContentToken = (t: string) => t.length >= 3 && /^[a-z][a-z0-9-]*$/.test(t) && !STOPWORDS.has(t)
