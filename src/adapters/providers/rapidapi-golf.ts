import * as z from 'zod'
import type {
  CanonicalGame,
  EndpointConfig,
  League,
  ProviderQuery,
  Sport,
  SportsProvider,
} from '../provider-types.js'
import { Id, Status, Text, listFrom } from './shared.js'

// far end of the open-ended range used to list upcoming tournaments
const END_OF_CALENDAR = '2099-12-31'

const Tour = z.object({ id: Id.nullish(), name: Text }).nullish()

const GolfEvent = z.object({
  id: Id,
  name: Text,
  tour: Tour,
  tournament_id: Id.nullish(),
  tournament_name: z.string().nullish(),
  startDatetime: z.string().nullish(),
  endDatetime: z.string().nullish(),
  status: Status,
  course: z.string().nullish(),
  country: Text,
  country_code: Text,
  logoUrl: Text,
})

type GolfEvent = z.infer<typeof GolfEvent>

function leagueIdOf(event: GolfEvent): string | undefined {
  return event.tour?.id ?? event.tournament_id ?? undefined
}

/**
 * Live Golf API on RapidAPI. There is no league listing: both discovery and
 * games read `/v1/events`, and the tour an event belongs to is its league.
 * Golf has no home/away, the event name goes in the home slot.
 */
export class RapidApiGolfProvider implements SportsProvider {
  readonly name = 'rapidapi-golf' as const

  leaguesQuery(_sport: Sport, endpoints: EndpointConfig, today: string): ProviderQuery {
    return { path: endpoints.leagues, params: { start_date: today, end_date: END_OF_CALENDAR } }
  }

  leagueItems(payload: unknown): unknown[] {
    return listFrom(payload, 'events')
  }

  parseLeague(item: unknown, sport: Sport, season: number): League | null {
    const event = GolfEvent.parse(item)
    const id = leagueIdOf(event)
    const name = event.tour?.name || event.tournament_name
    if (id == null || !name) return null

    return {
      id,
      name,
      type: 'tournament',
      logo: event.logoUrl,
      country: event.country,
      countryCode: event.country_code,
      flag: '',
      season,
      sport,
      provider: this.name,
    }
  }

  gamesQuery(_sport: Sport, endpoints: EndpointConfig, _league: League, date: string): ProviderQuery {
    return { path: endpoints.games, params: { start_date: date, end_date: date } }
  }

  gameItems(payload: unknown): unknown[] {
    return listFrom(payload, 'events')
  }

  // the events feed is not filtered by tour, so other tours' events are dropped here
  parseGame(item: unknown, sport: Sport, league: League): CanonicalGame | null {
    const event = GolfEvent.parse(item)
    if (leagueIdOf(event) !== league.id) return null

    return {
      apiGameId: event.id,
      sport,
      leagueId: league.id,
      leagueName: league.name,
      season: league.season,
      homeTeamName: event.name,
      awayTeamName: '',
      startTime: event.startDatetime ?? null,
      endTime: event.endDatetime ?? null,
      status: event.status || 'upcoming',
      score: null,
      venue: event.course ?? null,
      provider: this.name,
      raw: item,
    }
  }
}
