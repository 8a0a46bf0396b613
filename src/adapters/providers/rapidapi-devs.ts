import type {
  CanonicalGame,
  EndpointConfig,
  League,
  ProviderQuery,
  Sport,
  SportsProvider,
} from '../provider-types.js'
import { flattenMatchGroups, listFrom } from './shared.js'
import { devsMatchToGame, devsTournamentToLeague } from './sportdevs.js'

const PAGE = { offset: 0, limit: 50, lang: 'en' } as const

/**
 * darts-devs / tennis-devs on RapidAPI. Same data model as SportDevs, but
 * filters are plain `eq.` params and `matches-by-date` answers with one
 * object per date, each holding a `matches` array.
 */
export class DevsRapidApiProvider implements SportsProvider {
  constructor(readonly name: 'rapidapi-darts' | 'rapidapi-tennis') {}

  leaguesQuery(_sport: Sport, endpoints: EndpointConfig): ProviderQuery {
    return { path: endpoints.leagues, params: { ...PAGE } }
  }

  leagueItems(payload: unknown): unknown[] {
    return listFrom(payload, 'tournaments')
  }

  parseLeague(item: unknown, sport: Sport, season: number): League | null {
    return devsTournamentToLeague(item, sport, season, this.name)
  }

  gamesQuery(_sport: Sport, endpoints: EndpointConfig, league: League, date: string): ProviderQuery {
    return {
      path: endpoints.games,
      params: { ...PAGE, date: `eq.${date}`, tournament_id: `eq.${league.id}` },
    }
  }

  gameItems(payload: unknown): unknown[] {
    return flattenMatchGroups(payload)
  }

  parseGame(item: unknown, sport: Sport, league: League): CanonicalGame {
    return devsMatchToGame(item, sport, league, this.name)
  }
}
