import * as z from 'zod'
import type {
  CanonicalGame,
  EndpointConfig,
  League,
  ProviderQuery,
  Sport,
  SportsProvider,
} from '../provider-types.js'
import { Id, Named, Status, Text, listFrom, toScore } from './shared.js'

const LeagueFields = z.object({
  id: Id.nullish(),
  name: Text,
  type: Text,
  logo: Text,
})

const Country = z
  .object({ name: Text, code: Text, flag: Text })
  .nullish()

// football nests the league under `league`; the other sports are flat
const LeagueItem = LeagueFields.extend({
  league: LeagueFields.nullish(),
  country: Country,
})

const Teams = z
  .object({ home: Named, away: Named })
  .nullish()

const Venue = z.union([z.string(), Named]).nullish().transform((value) => {
  if (value == null) return null
  if (typeof value === 'string') return value || null
  return value.name || null
})

const FootballGame = z.object({
  fixture: z.object({
    id: Id,
    date: z.string().nullish(),
    status: Status,
    venue: Venue,
  }),
  teams: Teams,
  goals: z.object({ home: z.unknown(), away: z.unknown() }).nullish(),
})

const TeamGame = z.object({
  id: Id,
  date: z.string().nullish(),
  status: Status,
  venue: Venue,
  teams: Teams,
  scores: z.object({ home: z.unknown(), away: z.unknown() }).nullish(),
})

const Race = z.object({
  id: Id,
  date: z.string().nullish(),
  status: Status,
  competition: Named,
  circuit: Named,
})

const Fight = z.object({
  id: Id,
  date: z.string().nullish(),
  status: Status,
  fighters: z.object({ first: Named, second: Named }).nullish(),
})

type GameFields = Omit<CanonicalGame, 'sport' | 'leagueId' | 'leagueName' | 'season' | 'provider' | 'raw' | 'endTime'>

/**
 * api-sports.io: one host per sport, leagues filtered by season, games by
 * league + season + exact date. Response bodies wrap results in `response`.
 */
export class ApiSportsProvider implements SportsProvider {
  readonly name = 'api-sports' as const

  leaguesQuery(_sport: Sport, endpoints: EndpointConfig, today: string): ProviderQuery {
    return { path: endpoints.leagues, params: { season: Number(today.slice(0, 4)) } }
  }

  leagueItems(payload: unknown): unknown[] {
    return listFrom(payload, 'response')
  }

  parseLeague(item: unknown, sport: Sport, season: number): League | null {
    const parsed = LeagueItem.parse(item)
    const league = parsed.league ?? parsed
    if (league.id == null) return null

    return {
      id: league.id,
      name: league.name,
      type: league.type,
      logo: league.logo,
      country: parsed.country?.name ?? '',
      countryCode: parsed.country?.code ?? '',
      flag: parsed.country?.flag ?? '',
      season,
      sport,
      provider: this.name,
    }
  }

  gamesQuery(_sport: Sport, endpoints: EndpointConfig, league: League, date: string): ProviderQuery {
    return {
      path: endpoints.games,
      params: { league: league.id, season: league.season, date },
    }
  }

  gameItems(payload: unknown): unknown[] {
    return listFrom(payload, 'response')
  }

  parseGame(item: unknown, sport: Sport, league: League): CanonicalGame {
    const fields = this.mapGame(item, sport)

    return {
      ...fields,
      sport,
      leagueId: league.id,
      leagueName: league.name,
      season: league.season,
      endTime: null,
      provider: this.name,
      raw: item,
    }
  }

  private mapGame(item: unknown, sport: Sport): GameFields {
    switch (sport) {
      case 'football': {
        const game = FootballGame.parse(item)
        return {
          apiGameId: game.fixture.id,
          homeTeamName: game.teams?.home?.name ?? '',
          awayTeamName: game.teams?.away?.name ?? '',
          startTime: game.fixture.date ?? null,
          status: game.fixture.status,
          score: game.goals ? toScore(game.goals.home, game.goals.away) : null,
          venue: game.fixture.venue,
        }
      }

      case 'formula-1': {
        const race = Race.parse(item)
        return {
          apiGameId: race.id,
          homeTeamName: race.competition?.name ?? '',
          awayTeamName: '',
          startTime: race.date ?? null,
          status: race.status,
          score: null,
          venue: race.circuit?.name || null,
        }
      }

      case 'mma': {
        const fight = Fight.parse(item)
        return {
          apiGameId: fight.id,
          homeTeamName: fight.fighters?.first?.name ?? '',
          awayTeamName: fight.fighters?.second?.name ?? '',
          startTime: fight.date ?? null,
          status: fight.status,
          score: null,
          venue: null,
        }
      }

      default: {
        const game = TeamGame.parse(item)
        return {
          apiGameId: game.id,
          homeTeamName: game.teams?.home?.name ?? '',
          awayTeamName: game.teams?.away?.name ?? '',
          startTime: game.date ?? null,
          status: game.status,
          score: game.scores ? toScore(game.scores.home, game.scores.away) : null,
          venue: game.venue,
        }
      }
    }
  }
}
