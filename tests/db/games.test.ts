import { describe, it, expect, beforeEach } from 'vitest'
import { sql } from 'drizzle-orm'
import { GameStore, parseDatetime } from '../../src/db/games.js'
import { createTestContext, countGames } from '../helpers/setup-db.js'
import { makeGame } from '../helpers/fixtures.js'
import type { Context } from '../../src/ctx.js'

const unix = (iso: string) => Date.parse(iso) / 1000

describe('parseDatetime', () => {
  it('parses ISO strings with an offset', () => {
    expect(parseDatetime('2025-03-01T19:30:00Z')?.toISOString()).toBe('2025-03-01T19:30:00.000Z')
    expect(parseDatetime('2025-03-01T19:30:00+01:00')?.toISOString()).toBe('2025-03-01T18:30:00.000Z')
    expect(parseDatetime('2025-03-01T19:30:00-0500')?.toISOString()).toBe('2025-03-02T00:30:00.000Z')
  })

  it('accepts an hours-only offset', () => {
    expect(parseDatetime('2025-03-01T19:30:00+05')?.toISOString()).toBe('2025-03-01T14:30:00.000Z')
    expect(parseDatetime('2025-03-01T19:30-03')?.toISOString()).toBe('2025-03-01T22:30:00.000Z')
  })

  it('reads strings without an offset as UTC', () => {
    expect(parseDatetime('2025-03-01T19:30:00')?.toISOString()).toBe('2025-03-01T19:30:00.000Z')
    expect(parseDatetime('2025-03-01 19:30')?.toISOString()).toBe('2025-03-01T19:30:00.000Z')
    expect(parseDatetime('2025-03-01')?.toISOString()).toBe('2025-03-01T00:00:00.000Z')
  })

  it('truncates sub-millisecond fractions', () => {
    expect(parseDatetime('2025-03-01T19:30:00.123456Z')?.toISOString()).toBe('2025-03-01T19:30:00.123Z')
  })

  it('returns null for empty or malformed input', () => {
    expect(parseDatetime('')).toBeNull()
    expect(parseDatetime(null)).toBeNull()
    expect(parseDatetime(undefined)).toBeNull()
    expect(parseDatetime('not a date')).toBeNull()
    expect(parseDatetime('01/03/2025 19:30')).toBeNull()
  })
})

describe('GameStore', () => {
  let ctx: Context
  let store: GameStore

  beforeEach(async () => {
    ctx = await createTestContext()
    store = new GameStore(ctx)
  })

  it('saving the same game twice leaves one row', async () => {
    expect(await store.saveGame(makeGame())).toBe(true)
    expect(await store.saveGame(makeGame())).toBe(true)

    expect(await countGames(ctx)).toBe(1)
  })

  it('overwrites mutable fields of the existing row', async () => {
    await store.saveGame(makeGame())
    const [before] = await store.listGames({ limit: 10 })

    await store.saveGame(makeGame({
      status: 'finished',
      score: { home: 3, away: 1 },
      startTime: '2025-03-01T20:00:00Z',
    }))

    const rows = await store.listGames({ limit: 10 })
    expect(rows).toHaveLength(1)

    const [after] = rows
    expect(after?.id).toBe(before?.id)
    expect(after?.createdAt).toBe(before?.createdAt)
    expect(after?.status).toBe('finished')
    expect(after?.score).toBe('{"home":3,"away":1}')
    expect(after?.startTime).toBe(unix('2025-03-01T20:00:00Z'))
    expect(after?.homeTeamName).toBe('Player One')
    expect(after?.venue).toBe('Alexandra Palace')
    expect(after?.leagueName).toBe('PDC World Championship')
  })

  it('clears a field the new payload no longer carries', async () => {
    await store.saveGame(makeGame({ score: { home: 1, away: 0 } }))
    await store.saveGame(makeGame({ score: null, venue: null }))

    const [row] = await store.listGames({ limit: 10 })
    expect(row?.score).toBeNull()
    expect(row?.venue).toBeNull()
  })

  it('keeps games from different seasons apart', async () => {
    await store.saveGame(makeGame({ season: 2024 }))
    await store.saveGame(makeGame({ season: 2025 }))

    expect(await countGames(ctx)).toBe(2)
  })

  it('stores start time as unix seconds and the raw payload as JSON', async () => {
    await store.saveGame(makeGame({ raw: { id: 'm-1', extra: true } }))

    const [row] = await store.listGames({ limit: 10 })
    expect(row?.startTime).toBe(unix('2025-03-01T19:30:00Z'))
    expect(row?.endTime).toBeNull()
    expect(row?.rawJson).toBe('{"id":"m-1","extra":true}')
  })

  it('stores bookkeeping times in unix seconds', async () => {
    const before = Math.floor(Date.now() / 1000)
    await store.saveGame(makeGame())
    const after = Math.floor(Date.now() / 1000)

    const [row] = await store.listGames({ limit: 10 })
    for (const value of [row?.fetchedAt, row?.createdAt, row?.updatedAt]) {
      expect(value).toBeGreaterThanOrEqual(before)
      expect(value).toBeLessThanOrEqual(after)
    }
  })

  it('stores NULL for an unparseable start time', async () => {
    expect(await store.saveGame(makeGame({ startTime: 'tbc' }))).toBe(true)

    const [row] = await store.listGames({ limit: 10 })
    expect(row?.startTime).toBeNull()
  })

  it('returns false instead of throwing on a database error', async () => {
    await ctx.db.run(sql`DROP TABLE api_games`)

    await expect(store.saveGame(makeGame())).resolves.toBe(false)
  })

  it('lists games filtered by sport, newest first', async () => {
    await store.saveGame(makeGame({ apiGameId: 'a', startTime: '2025-03-01T10:00:00Z' }))
    await store.saveGame(makeGame({ apiGameId: 'b', startTime: '2025-03-02T10:00:00Z' }))
    await store.saveGame(makeGame({ apiGameId: 'c', sport: 'tennis', provider: 'rapidapi-tennis' }))

    const darts = await store.listGames({ sport: 'darts', limit: 10 })
    expect(darts.map((g) => g.apiGameId)).toEqual(['b', 'a'])

    const limited = await store.listGames({ limit: 1 })
    expect(limited).toHaveLength(1)
  })

  it('totals games, leagues per sport and sports', async () => {
    await store.saveGame(makeGame({ apiGameId: 'a' }))
    await store.saveGame(makeGame({ apiGameId: 'b' }))
    await store.saveGame(makeGame({ apiGameId: 'c', leagueId: '23' }))
    await store.saveGame(makeGame({ apiGameId: 'd', sport: 'tennis', provider: 'rapidapi-tennis' }))

    expect(await store.totals()).toEqual({ totalGames: 4, uniqueLeagues: 3, uniqueSports: 2 })
  })

  it('totals an empty table as zeros', async () => {
    expect(await store.totals()).toEqual({ totalGames: 0, uniqueLeagues: 0, uniqueSports: 0 })
  })
})
