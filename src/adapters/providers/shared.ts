import * as z from 'zod'
import type { GameScore } from '../provider-types.js'

// Provider ids arrive as numbers or strings; the canonical record keeps strings.
export const Id = z.union([z.string().min(1), z.number()]).transform(String)

// Optional display text; null and missing both become ''
export const Text = z.string().nullish().transform((value) => value ?? '')

// A `{ name }` object some providers use for teams, venues and countries
export const Named = z.object({ name: Text }).nullish()

// Status is a plain string on some feeds, `{ long }` / `{ type }` on others
export const Status = z
  .union([
    z.string(),
    z.object({ long: z.string().nullish(), type: z.string().nullish(), description: z.string().nullish() }),
  ])
  .nullish()
  .transform((value) => {
    if (value == null) return ''
    if (typeof value === 'string') return value
    return value.long ?? value.description ?? value.type ?? ''
  })

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reduce a provider's score value to a number. Handles bare numbers, numeric
 * strings and the `{ total }` / `{ current }` / `{ display }` wrappers.
 */
export function scoreValue(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? n : null
  }
  if (isRecord(value)) {
    for (const key of ['total', 'current', 'display']) {
      const inner = scoreValue(value[key])
      if (inner !== null) return inner
    }
  }
  return null
}

/** `null` unless at least one side carries a score. */
export function toScore(home: unknown, away: unknown): GameScore | null {
  const score = { home: scoreValue(home), away: scoreValue(away) }
  return score.home === null && score.away === null ? null : score
}

/**
 * Unwrap a list payload: either a bare array or an object holding the list
 * under one of `keys`.
 */
export function listFrom(payload: unknown, ...keys: string[]): unknown[] {
  if (Array.isArray(payload)) return payload
  if (isRecord(payload)) {
    for (const key of keys) {
      const value = payload[key]
      if (Array.isArray(value)) return value
    }
  }
  return []
}

/**
 * Flatten responses that bucket matches by date, e.g.
 * `[{ date: '2025-01-01', matches: [...] }, ...]`. Items without a
 * `matches` array are kept as matches themselves.
 */
export function flattenMatchGroups(payload: unknown): unknown[] {
  const items = listFrom(payload, 'matches')
  return items.flatMap((item) => {
    if (isRecord(item) && Array.isArray(item['matches'])) {
      return item['matches']
    }
    return [item]
  })
}
