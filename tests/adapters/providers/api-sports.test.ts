import { describe, it, expect } from 'vitest'
import { ApiSportsProvider } from '../../../src/adapters/providers/api-sports.js'
import { makeLeague } from '../../helpers/fixtures.js'

describe('ApiSportsProvider', () => {
  const provider = new ApiSportsProvider()
  const endpoints = { leagues: '/leagues', games: '/fixtures' }

  it('queries leagues by season and games by league, season and date', () => {
    const league = makeLeague({ id: '39', season: 2025, sport: 'football', provider: 'api-sports' })

    expect(provider.leaguesQuery('football', endpoints, '2025-03-01')).toEqual({ path: '/leagues', params: { season: 2025 } })
    expect(provider.gamesQuery('football', endpoints, league, '2025-03-01')).toEqual({
      path: '/fixtures',
      params: { league: '39', season: 2025, date: '2025-03-01' },
    })
  })

  it('parses nested football leagues', () => {
    const [item] = provider.leagueItems({
      response: [{
        league: { id: 39, name: 'Premier League', type: 'League', logo: 'pl.png' },
        country: { name: 'England', code: 'GB', flag: 'gb.svg' },
      }],
    })

    expect(provider.parseLeague(item, 'football', 2025)).toEqual({
      id: '39',
      name: 'Premier League',
      type: 'League',
      logo: 'pl.png',
      country: 'England',
      countryCode: 'GB',
      flag: 'gb.svg',
      season: 2025,
      sport: 'football',
      provider: 'api-sports',
    })
  })

  it('parses flat leagues and skips ones without an id', () => {
    const league = provider.parseLeague({ id: 12, name: 'NBA', type: 'League', country: { name: 'USA' } }, 'basketball', 2025)

    expect(league?.id).toBe('12')
    expect(league?.country).toBe('USA')
    expect(provider.parseLeague({ name: 'No id' }, 'basketball', 2025)).toBeNull()
  })

  it('maps football fixtures', () => {
    const league = makeLeague({ id: '39', name: 'Premier League', sport: 'football', provider: 'api-sports' })
    const raw = {
      fixture: { id: 1001, date: '2025-03-01T15:00:00+00:00', status: { long: 'Not Started', short: 'NS' }, venue: { name: 'Home Ground' } },
      teams: { home: { name: 'Home FC' }, away: { name: 'Away FC' } },
      goals: { home: null, away: null },
    }

    const game = provider.parseGame(raw, 'football', league)

    expect(game).toMatchObject({
      apiGameId: '1001',
      sport: 'football',
      leagueId: '39',
      leagueName: 'Premier League',
      homeTeamName: 'Home FC',
      awayTeamName: 'Away FC',
      startTime: '2025-03-01T15:00:00+00:00',
      endTime: null,
      status: 'Not Started',
      score: null,
      venue: 'Home Ground',
      provider: 'api-sports',
    })
    expect(game.raw).toBe(raw)
  })

  it('maps team games with wrapped scores', () => {
    const league = makeLeague({ id: '12', name: 'NBA', sport: 'basketball', provider: 'api-sports' })

    const game = provider.parseGame({
      id: 55,
      date: '2025-03-01T00:30:00+00:00',
      status: { long: 'Game Finished' },
      teams: { home: { name: 'Home Five' }, away: { name: 'Away Five' } },
      scores: { home: { total: 101 }, away: { total: '99' } },
    }, 'basketball', league)

    expect(game.apiGameId).toBe('55')
    expect(game.homeTeamName).toBe('Home Five')
    expect(game.score).toEqual({ home: 101, away: 99 })
    expect(game.venue).toBeNull()
  })

  it('maps races and fights', () => {
    const league = makeLeague({ sport: 'formula-1', provider: 'api-sports' })

    const race = provider.parseGame({
      id: 7,
      date: '2025-05-25T13:00:00+00:00',
      status: 'Scheduled',
      competition: { name: 'Monaco Grand Prix' },
      circuit: { name: 'Circuit de Monaco' },
    }, 'formula-1', league)
    expect(race).toMatchObject({ apiGameId: '7', homeTeamName: 'Monaco Grand Prix', awayTeamName: '', venue: 'Circuit de Monaco' })

    const fight = provider.parseGame({
      id: 8,
      date: '2025-04-12T02:00:00+00:00',
      status: { long: 'Not Started' },
      fighters: { first: { name: 'Fighter A' }, second: { name: 'Fighter B' } },
    }, 'mma', league)
    expect(fight).toMatchObject({ apiGameId: '8', homeTeamName: 'Fighter A', awayTeamName: 'Fighter B' })
  })

  it('throws on a game without an id', () => {
    expect(() => provider.parseGame({ teams: {} }, 'hockey', makeLeague())).toThrow()
  })
})
