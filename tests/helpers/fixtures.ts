import type { CanonicalGame, League } from '../../src/adapters/provider-types.js'

export const DARTS_URL = 'https://darts-devs.p.rapidapi.com'

export function makeLeague(overrides?: Partial<League>): League {
  return {
    id: '17',
    name: 'PDC World Championship',
    type: 'tournament',
    logo: '',
    country: 'England',
    countryCode: 'GB',
    flag: '',
    season: 2025,
    sport: 'darts',
    provider: 'rapidapi-darts',
    ...overrides,
  }
}

export function makeGame(overrides?: Partial<CanonicalGame>): CanonicalGame {
  return {
    apiGameId: 'm-1',
    sport: 'darts',
    leagueId: '17',
    leagueName: 'PDC World Championship',
    season: 2025,
    homeTeamName: 'Player One',
    awayTeamName: 'Player Two',
    startTime: '2025-03-01T19:30:00Z',
    endTime: null,
    status: 'scheduled',
    score: null,
    venue: 'Alexandra Palace',
    provider: 'rapidapi-darts',
    raw: { id: 'm-1' },
    ...overrides,
  }
}

export const dartsTournaments = [
  { id: 17, name: 'PDC World Championship', country: 'England', country_code: 'GB' },
  { id: 23, name: 'Premier League Darts', country: 'England', country_code: 'GB' },
]

export function dartsMatch(id: number, home: string, away: string) {
  return {
    id,
    tournament_id: 17,
    tournament_name: 'PDC World Championship',
    home_team_name: home,
    away_team_name: away,
    start_time: '2025-03-01T19:00:00+00:00',
    status: { type: 'notstarted' },
    home_team_score: null,
    away_team_score: null,
    arena_name: 'Alexandra Palace',
  }
}

// matches-by-date answers one object per date
export const dartsMatchesByDate = [
  {
    date: '2025-03-01',
    matches: [
      dartsMatch(101, 'Player One', 'Player Two'),
      dartsMatch(102, 'Player Three', 'Player Four'),
      dartsMatch(103, 'Player Five', 'Player Six'),
    ],
  },
]
