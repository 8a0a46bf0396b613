import * as z from 'zod'
import type {
  CanonicalGame,
  EndpointConfig,
  League,
  ProviderName,
  ProviderQuery,
  Sport,
  SportsProvider,
} from '../provider-types.js'
import { Id, Named, Status, Text, listFrom, toScore } from './shared.js'
import { endpoint } from './sportdevs-query.js'

const PAGE_SIZE = 50

export const DevsTournament = z.object({
  id: Id.nullish(),
  name: Text,
  logo: Text,
  country: Text,
  country_code: Text,
  flag: Text,
})

// Match shape shared by SportDevs and the *-devs feeds on RapidAPI. Older
// payloads use `home.name` / `date`, newer ones flat `home_team_name` / `start_time`.
export const DevsMatch = z.object({
  id: Id,
  tournament_id: Id.nullish(),
  tournament_name: z.string().nullish(),
  home_team_name: z.string().nullish(),
  away_team_name: z.string().nullish(),
  home: Named,
  away: Named,
  start_time: z.string().nullish(),
  date: z.string().nullish(),
  end_time: z.string().nullish(),
  status: Status,
  home_team_score: z.unknown(),
  away_team_score: z.unknown(),
  arena_name: z.string().nullish(),
  venue: z.string().nullish(),
})

export function devsTournamentToLeague(
  item: unknown,
  sport: Sport,
  season: number,
  provider: ProviderName,
): League | null {
  const tournament = DevsTournament.parse(item)
  if (tournament.id == null) return null

  return {
    id: tournament.id,
    name: tournament.name,
    type: 'tournament',
    logo: tournament.logo,
    country: tournament.country,
    countryCode: tournament.country_code,
    flag: tournament.flag,
    season,
    sport,
    provider,
  }
}

export function devsMatchToGame(
  item: unknown,
  sport: Sport,
  league: League,
  provider: ProviderName,
): CanonicalGame {
  const match = DevsMatch.parse(item)

  return {
    apiGameId: match.id,
    sport,
    leagueId: match.tournament_id ?? league.id,
    leagueName: match.tournament_name || league.name,
    season: league.season,
    homeTeamName: match.home_team_name ?? match.home?.name ?? '',
    awayTeamName: match.away_team_name ?? match.away?.name ?? '',
    startTime: match.start_time ?? match.date ?? null,
    endTime: match.end_time ?? null,
    status: match.status,
    score: toScore(match.home_team_score, match.away_team_score),
    venue: match.arena_name ?? match.venue ?? null,
    provider,
    raw: item,
  }
}

/**
 * sportdevs.com: unauthenticated, filters are pushed to the server through
 * the PostgREST-style query builder.
 */
export class SportDevsProvider implements SportsProvider {
  readonly name = 'sportdevs' as const

  leaguesQuery(_sport: Sport, endpoints: EndpointConfig): ProviderQuery {
    return endpoint(endpoints.leagues).limit(PAGE_SIZE).build()
  }

  leagueItems(payload: unknown): unknown[] {
    return listFrom(payload, 'tournaments')
  }

  parseLeague(item: unknown, sport: Sport, season: number): League | null {
    return devsTournamentToLeague(item, sport, season, this.name)
  }

  gamesQuery(_sport: Sport, endpoints: EndpointConfig, league: League, date: string): ProviderQuery {
    return endpoint(endpoints.games)
      .property('tournament_id').equals(league.id)
      .property('date').greaterThanOrEqual(date)
      .limit(PAGE_SIZE)
      .build()
  }

  gameItems(payload: unknown): unknown[] {
    return listFrom(payload, 'matches')
  }

  parseGame(item: unknown, sport: Sport, league: League): CanonicalGame {
    return devsMatchToGame(item, sport, league, this.name)
  }
}
