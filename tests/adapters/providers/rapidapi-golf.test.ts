import { describe, it, expect } from 'vitest'
import { RapidApiGolfProvider } from '../../../src/adapters/providers/rapidapi-golf.js'
import { makeLeague } from '../../helpers/fixtures.js'

const event = {
  id: 'evt-1',
  name: 'Spring Invitational',
  tour: { id: 'pga', name: 'PGA Tour' },
  startDatetime: '2025-03-06T12:00:00Z',
  endDatetime: '2025-03-09T23:00:00Z',
  course: 'Lakeside Links',
  country: 'USA',
}

describe('RapidApiGolfProvider', () => {
  const provider = new RapidApiGolfProvider()
  const endpoints = { leagues: '/v1/events', games: '/v1/events' }

  it('queries events by date range', () => {
    expect(provider.leaguesQuery('golf', endpoints, '2025-03-01')).toEqual({
      path: '/v1/events',
      params: { start_date: '2025-03-01', end_date: '2099-12-31' },
    })
    expect(provider.gamesQuery('golf', endpoints, makeLeague(), '2025-03-06').params).toEqual({
      start_date: '2025-03-06',
      end_date: '2025-03-06',
    })
  })

  it('derives leagues from event tours', () => {
    expect(provider.parseLeague(event, 'golf', 2025)).toMatchObject({ id: 'pga', name: 'PGA Tour', country: 'USA' })
    expect(provider.parseLeague({ id: 'evt-2', tournament_id: 88, tournament_name: 'Open Series' }, 'golf', 2025))
      .toMatchObject({ id: '88', name: 'Open Series' })
    expect(provider.parseLeague({ id: 'evt-3', name: 'Exhibition' }, 'golf', 2025)).toBeNull()
  })

  it('maps an event into a game', () => {
    const league = makeLeague({ id: 'pga', name: 'PGA Tour', sport: 'golf', provider: 'rapidapi-golf' })

    expect(provider.parseGame(event, 'golf', league)).toMatchObject({
      apiGameId: 'evt-1',
      leagueId: 'pga',
      leagueName: 'PGA Tour',
      homeTeamName: 'Spring Invitational',
      awayTeamName: '',
      startTime: '2025-03-06T12:00:00Z',
      endTime: '2025-03-09T23:00:00Z',
      status: 'upcoming',
      venue: 'Lakeside Links',
    })
  })

  it('drops events of other tours', () => {
    const pga = makeLeague({ id: 'pga', name: 'PGA Tour', sport: 'golf', provider: 'rapidapi-golf' })

    expect(provider.parseGame({ ...event, tour: { id: 'lpga', name: 'LPGA Tour' } }, 'golf', pga)).toBeNull()
  })

  it('files tour-less events under their tournament id', () => {
    const series = makeLeague({ id: '88', name: 'Open Series', sport: 'golf', provider: 'rapidapi-golf' })
    const other = makeLeague({ id: '99', name: 'Club Series', sport: 'golf', provider: 'rapidapi-golf' })
    const tourless = { id: 'evt-2', name: 'Spring Open', tournament_id: 88, tournament_name: 'Open Series' }

    expect(provider.parseGame(tourless, 'golf', series)).toMatchObject({ apiGameId: 'evt-2', leagueId: '88', leagueName: 'Open Series' })
    expect(provider.parseGame(tourless, 'golf', other)).toBeNull()
    expect(provider.parseGame({ id: 'evt-3', name: 'Exhibition' }, 'golf', series)).toBeNull()
  })

  it('unwraps an events list', () => {
    expect(provider.gameItems({ events: [event] })).toHaveLength(1)
  })
})
