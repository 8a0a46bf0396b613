import { count, desc, eq, sql } from 'drizzle-orm'
import id128 from 'id128'
import { Logs, Severity, describeError } from '../log.js'
import type { CanonicalGame, Sport, StoredTotals } from '../adapters/provider-types.js'
import { apiGames, unixNow } from './schema.js'

// 2025-03-01, 2025-03-01T19:30:00, 2025-03-01 19:30, 2025-03-01T19:30:00.123456+01:00, ...+05, ...Z
const ISO_DATETIME = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i

/**
 * Parse a provider timestamp. Accepts ISO-8601 dates and date-times with or
 * without an offset; values without one are read as UTC. Returns null for
 * empty or malformed input instead of throwing.
 */
export function parseDatetime(value: string | null | undefined): Date | null {
  if (!value) return null

  const match = ISO_DATETIME.exec(value.trim())
  if (!match) return null

  const date = match[1] ?? ''
  // Date keeps milliseconds only
  const time = (match[2] ?? '00:00:00').replace(/(\.\d{3})\d+$/, '$1')
  let zone = (match[3] ?? 'Z').toUpperCase()
  if (/^[+-]\d{2}$/.test(zone)) {
    zone = `${zone}:00`
  } else if (/^[+-]\d{4}$/.test(zone)) {
    zone = `${zone.slice(0, 3)}:${zone.slice(3)}`
  }

  const parsed = new Date(`${date}T${time}${zone}`)
  return Number.isNaN(parsed.getTime()) ? null : parsed
}

function toUnixSeconds(date: Date | null): number | null {
  return date ? Math.floor(date.getTime() / 1000) : null
}

export interface ListGamesOptions {
  sport?: Sport | undefined
  limit: number
}

export type StoredGame = typeof apiGames.$inferSelect

/**
 * Persistence sink for canonical games. One row per
 * (sport, league_id, season, api_game_id); re-saving a game overwrites its
 * mutable fields in place.
 */
export class GameStore extends Logs {
  async saveGame(game: CanonicalGame): Promise<boolean> {
    const now = unixNow()
    const startTime = parseDatetime(game.startTime)
    const endTime = parseDatetime(game.endTime)

    if (game.startTime && !startTime) {
      this.log(Severity.WRN, `Unparseable start_time '${game.startTime}' for game ${game.apiGameId}, storing NULL`)
    }
    if (game.endTime && !endTime) {
      this.log(Severity.WRN, `Unparseable end_time '${game.endTime}' for game ${game.apiGameId}, storing NULL`)
    }

    // single field list for both the insert and the conflict update
    const row = {
      apiGameId: game.apiGameId,
      sport: game.sport,
      leagueId: game.leagueId,
      season: game.season,

      leagueName: game.leagueName,
      provider: game.provider,
      homeTeamName: game.homeTeamName,
      awayTeamName: game.awayTeamName,
      startTime: toUnixSeconds(startTime),
      endTime: toUnixSeconds(endTime),
      status: game.status,
      score: game.score ? JSON.stringify(game.score) : null,
      venue: game.venue,
      rawJson: JSON.stringify(game.raw ?? null),
      fetchedAt: now,
      updatedAt: now,
    } satisfies Omit<typeof apiGames.$inferInsert, 'id' | 'createdAt'>

    const { apiGameId, sport, leagueId, season, ...mutable } = row

    try {
      await this.ctx.db
        .insert(apiGames)
        .values({
          ...row,
          id: id128.Ulid.generate().toCanonical(),
          createdAt: now,
        })
        .onConflictDoUpdate({
          target: [apiGames.sport, apiGames.leagueId, apiGames.season, apiGames.apiGameId],
          set: mutable,
        })
        .run()

      this.log(Severity.DBG, `Saved game ${apiGameId} (${sport}/${leagueId}/${season})`)
      return true
    } catch (err) {
      this.log(
        Severity.ERR,
        `Failed to save game ${apiGameId} (${sport}/${leagueId}/${season}): ${describeError(err)} raw=${row.rawJson}`,
      )
      return false
    }
  }

  async listGames(options: ListGamesOptions): Promise<StoredGame[]> {
    return this.ctx.db
      .select()
      .from(apiGames)
      .where(options.sport ? eq(apiGames.sport, options.sport) : undefined)
      .orderBy(desc(apiGames.startTime))
      .limit(options.limit)
      .all()
  }

  async totals(): Promise<StoredTotals> {
    const row = await this.ctx.db
      .select({
        totalGames: count(),
        // league ids are only unique within a sport
        uniqueLeagues: sql<number>`count(distinct ${apiGames.sport} || '/' || ${apiGames.leagueId})`.mapWith(Number),
        uniqueSports: sql<number>`count(distinct ${apiGames.sport})`.mapWith(Number),
      })
      .from(apiGames)
      .get()

    return {
      totalGames: row?.totalGames ?? 0,
      uniqueLeagues: row?.uniqueLeagues ?? 0,
      uniqueSports: row?.uniqueSports ?? 0,
    }
  }
}
