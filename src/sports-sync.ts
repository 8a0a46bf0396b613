import {
  DiscoverConfig,
  FetchGamesConfig,
  ListGamesConfig,
  SweepConfig,
} from "./config.js"
import { Context } from "./ctx.js"
import { MultiProviderApi, type PacingOptions } from "./adapters/multi-provider.js"
import type { FetchStatistics } from "./adapters/provider-types.js"
import { GameStore } from "./db/games.js"
import { SweepScheduler } from "./sweep-scheduler.js"

export class SweepRunner {
  constructor(private readonly api: MultiProviderApi, private readonly opts: SweepConfig) {}

  async once(): Promise<FetchStatistics> {
    await this.api.discoverAllLeagues(this.opts.sport ?? this.api.providerRegistry.sports)
    const result = await this.api.fetchAllLeaguesData({
      date: this.opts.date,
      nextDays: this.opts['next-days'],
      majorOnly: this.opts['major-only'],
    })

    return this.api.statistics(result)
  }
}

export class SportsSync {
  private ctx: Context

  constructor(opts: unknown) {
    this.ctx = new Context(opts)
  }

  // one client per command, so limiter windows and axios instances are shared
  private api(pacing?: PacingOptions): MultiProviderApi {
    return MultiProviderApi.create(this.ctx, this.ctx.config, pacing ? { pacing } : {})
  }

  providers() {
    console.log('\nProviders:')
    console.log('─'.repeat(80))

    for (const status of this.api().providerRegistry.status()) {
      const state = status.available ? 'available' : 'unavailable (no API key)'
      console.log(`${status.name.padEnd(20)} ${String(status.rateLimit).padStart(3)}/min  ${state}`)
      console.log(`${' '.repeat(20)} ${status.sports.join(', ')}`)
    }

    console.log('─'.repeat(80))
  }

  async discoverLeagues() {
    const opts = DiscoverConfig.parse(this.ctx.opts)

    const leagues = await this.api().discoverLeagues(opts.sport)

    console.log(`\n${opts.sport} leagues:`)
    console.log('─'.repeat(80))
    for (const league of leagues) {
      const country = league.country ? ` (${league.country})` : ''
      console.log(`${league.id.padEnd(12)} ${league.name}${country}`)
    }
    console.log(`Total: ${leagues.length} leagues`)
  }

  async fetchGames() {
    const opts = FetchGamesConfig.parse(this.ctx.opts)
    const api = this.api()

    const leagues = await api.discoverLeagues(opts.sport)
    const league = leagues.find((l) => l.id === opts.league)
    if (!league) {
      console.log(`League ${opts.league} not found for ${opts.sport}. Run 'discover-leagues --sport ${opts.sport}' to list ids.`)
      return
    }

    const saved = await api.syncGames(opts.sport, league, opts.date)
    console.log(`Saved ${saved} ${league.name} games for ${opts.date}`)
  }

  async sweep() {
    const opts = SweepConfig.parse(this.ctx.opts)
    const runner = new SweepRunner(
      this.api({ sportDelayMs: opts['sport-delay-ms'], requestDelayMs: opts['request-delay-ms'] }),
      opts,
    )

    if (!opts.repeat) {
      console.log(JSON.stringify(await runner.once(), null, 2))
      return
    }

    const controller = new AbortController()
    process.once('SIGINT', () => controller.abort())

    const scheduler = new SweepScheduler(this.ctx, async () => {
      console.log(JSON.stringify(await runner.once(), null, 2))
    }, {
      intervalMs: opts['interval-minutes'] * 60_000,
      retryDelayMs: opts['retry-delay-ms'],
    })
    await scheduler.run(controller.signal)
  }

  async stats() {
    const stats = await this.api().statistics()

    console.log('\nStored games:')
    console.log('─'.repeat(80))
    console.log(`Games:   ${stats.totalGames}`)
    console.log(`Leagues: ${stats.uniqueLeagues}`)
    console.log(`Sports:  ${stats.uniqueSports}`)
    console.log('─'.repeat(80))
  }

  async listGames() {
    const opts = ListGamesConfig.parse(this.ctx.opts)

    const games = await new GameStore(this.ctx).listGames({ sport: opts.sport, limit: opts.limit })

    console.log(`\nStored games${opts.sport ? ` for ${opts.sport}` : ''}:`)
    console.log('─'.repeat(80))

    for (const game of games) {
      const startTime = game.startTime
        ? new Date(game.startTime * 1000).toLocaleString()
        : 'TBD'
      const away = game.awayTeamName ? ` vs ${game.awayTeamName}` : ''

      console.log(`${game.apiGameId.padEnd(16)} ${game.homeTeamName ?? 'TBD'}${away}`)
      console.log(`${' '.repeat(16)} ${game.leagueName ?? game.leagueId} | Start: ${startTime} | Status: ${game.status || 'scheduled'}`)
    }

    console.log(`Total: ${games.length} games`)
    console.log('─'.repeat(80))
  }
}
