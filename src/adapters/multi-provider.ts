import * as z from 'zod'
import type { AxiosAdapter } from 'axios'
import type { Context } from '../ctx.js'
import { today as currentDate, type GlobalConfig } from '../config.js'
import { Logs, Severity, describeError } from '../log.js'
import { GameStore } from '../db/games.js'
import { ProviderHttpClient } from './http.js'
import { createProvider } from './providers/index.js'
import { ProviderRegistry } from './registry.js'
import { SlidingWindowRateLimiter, sleep } from './rate-limiter.js'
import type {
  CanonicalGame,
  FetchStatistics,
  League,
  ProviderName,
  Sport,
  SportsProvider,
  SweepOptions,
  SweepResult,
} from './provider-types.js'
import targetLeaguesJson from './target-leagues.json' with {type: 'json'}

const TargetLeagues = z.record(z.array(z.string()))
const TARGET_LEAGUES = TargetLeagues.parse(targetLeaguesJson)

export interface MultiProviderDeps {
  registry: ProviderRegistry
  http: ProviderHttpClient
  store: GameStore
}

export interface PacingOptions {
  /** pause between sports during discovery */
  sportDelayMs: number
  /** pause between games requests during a sweep */
  requestDelayMs: number
}

export interface CreateOptions {
  pacing?: PacingOptions
  /** in-process HTTP transport (tests) */
  adapter?: AxiosAdapter
}

export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`)
  d.setUTCDate(d.getUTCDate() + days)
  return d.toISOString().slice(0, 10)
}

export function isMajorLeague(sport: Sport, leagueName: string): boolean {
  const name = leagueName.toLowerCase()
  return (TARGET_LEAGUES[sport] ?? []).some((target) => name.includes(target.toLowerCase()))
}

/**
 * Fetch-and-normalize client over every configured provider.
 *
 * Discovery and games calls never throw: configuration, network and decode
 * failures are logged and produce an empty list. Items are parsed one by one
 * so a malformed game only drops itself.
 */
export class MultiProviderApi extends Logs {
  discoveredLeagues = new Map<Sport, League[]>()

  private readonly providers = new Map<ProviderName, SportsProvider>()
  private readonly registry: ProviderRegistry
  private readonly http: ProviderHttpClient
  private readonly store: GameStore

  constructor(
    ctx: Context,
    deps: MultiProviderDeps,
    private readonly pacing: PacingOptions = { sportDelayMs: 0, requestDelayMs: 0 },
    private readonly today: () => string = currentDate,
  ) {
    super(ctx)
    this.registry = deps.registry
    this.http = deps.http
    this.store = deps.store
  }

  /**
   * Wire registry, limiter, HTTP client and store from the global config.
   */
  static create(ctx: Context, config: GlobalConfig, options: CreateOptions = {}): MultiProviderApi {
    const registry = new ProviderRegistry(config)
    const limiter = new SlidingWindowRateLimiter(
      registry.providers.map((provider): [ProviderName, number] => [provider.name, provider.rateLimit]),
    )
    const http = new ProviderHttpClient(ctx, limiter, {
      timeoutMs: config['request-timeout-ms'],
      backoffMs: config['rate-limit-backoff-ms'],
      ...(options.adapter ? { adapter: options.adapter } : {}),
    })

    return new MultiProviderApi(ctx, { registry, http, store: new GameStore(ctx) }, options.pacing)
  }

  get providerRegistry(): ProviderRegistry {
    return this.registry
  }

  async discoverLeagues(sport: string): Promise<League[]> {
    const resolved = this.registry.resolve(sport)
    if (!resolved.ok) {
      this.log(Severity.WRN, `Skipping league discovery for ${sport}: ${resolved.error.message}`)
      return []
    }

    const provider = this.providerFor(resolved.config.name)
    const date = this.today()
    const season = Number(date.slice(0, 4))

    try {
      const query = provider.leaguesQuery(resolved.sport, resolved.endpoints, date)
      const payload = await this.http.get(resolved.config, resolved.sport, query)

      const parsed = this.parseEach(provider.leagueItems(payload), `${sport} league`, (item) =>
        provider.parseLeague(item, resolved.sport, season),
      )

      // golf derives leagues from events, so the same tour shows up repeatedly
      const leagues = [...new Map(parsed.map((league) => [league.id, league])).values()]

      this.log(Severity.INF, `Found ${leagues.length} leagues for ${sport} via ${provider.name}`)
      return leagues
    } catch (err) {
      this.log(Severity.ERR, `Error discovering leagues for ${sport}: ${describeError(err)}`)
      return []
    }
  }

  async fetchGames(sport: string, league: League, date: string): Promise<CanonicalGame[]> {
    try {
      return await this.loadGames(sport, league, date)
    } catch (err) {
      this.log(Severity.ERR, `Error fetching games for ${sport}/${league.name} on ${date}: ${describeError(err)}`)
      return []
    }
  }

  async discoverAllLeagues(sports: readonly Sport[] = this.registry.sports): Promise<Map<Sport, League[]>> {
    this.log(Severity.INF, `Starting league discovery for ${sports.length} sports`)

    const all = new Map<Sport, League[]>()

    for (const [index, sport] of sports.entries()) {
      if (index > 0) await sleep(this.pacing.sportDelayMs)

      const leagues = await this.discoverLeagues(sport)
      if (leagues.length > 0) {
        all.set(sport, leagues)
      } else {
        this.log(Severity.WRN, `No leagues found for ${sport}`)
      }
    }

    this.discoveredLeagues = all
    this.log(Severity.INF, `League discovery completed, found leagues for ${all.size} sports`)
    return all
  }

  async fetchAllLeaguesData(options: SweepOptions): Promise<SweepResult> {
    this.log(Severity.INF, `Starting fetch for ${options.date} and next ${options.nextDays} days`)

    const result: SweepResult = {
      totalLeagues: 0,
      successfulFetches: 0,
      failedFetches: 0,
      totalGames: 0,
      savedGames: 0,
      failedSaves: 0,
      failedLeagues: [],
    }

    let requests = 0

    for (const [sport, leagues] of this.discoveredLeagues) {
      const selected = options.majorOnly
        ? leagues.filter((league) => isMajorLeague(sport, league.name))
        : leagues

      this.log(Severity.INF, `Processing ${selected.length} of ${leagues.length} leagues for ${sport}`)

      for (const league of selected) {
        result.totalLeagues++

        try {
          for (let offset = 0; offset < options.nextDays; offset++) {
            if (requests++ > 0) await sleep(this.pacing.requestDelayMs)

            const date = addDays(options.date, offset)
            const games = await this.loadGames(sport, league, date)
            result.totalGames += games.length

            for (const game of games) {
              if (await this.store.saveGame(game)) {
                result.savedGames++
              } else {
                result.failedSaves++
              }
            }
          }

          result.successfulFetches++
        } catch (err) {
          result.failedFetches++
          result.failedLeagues.push(`${sport}/${league.name}`)
          this.log(Severity.ERR, `Failed to fetch data for ${sport}/${league.name}: ${describeError(err)}`)
        }
      }
    }

    this.log(
      Severity.INF,
      `Fetch completed: leagues=${result.totalLeagues} ok=${result.successfulFetches} ` +
        `failed=${result.failedFetches} games=${result.totalGames} saved=${result.savedGames}`,
    )
    return result
  }

  /**
   * Stored totals, plus the outcome of `sweep` when given.
   */
  async statistics(sweep?: SweepResult): Promise<FetchStatistics> {
    const totals = await this.store.totals()

    return {
      ...totals,
      failedLeagues: sweep?.failedLeagues ?? [],
      successfulFetches: sweep?.successfulFetches ?? 0,
      totalFetches: sweep ? sweep.successfulFetches + sweep.failedFetches : 0,
    }
  }

  /** Fetch and persist one league/date; returns how many games were saved. */
  async syncGames(sport: string, league: League, date: string): Promise<number> {
    const games = await this.fetchGames(sport, league, date)
    let saved = 0
    for (const game of games) {
      if (await this.store.saveGame(game)) saved++
    }
    return saved
  }

  private async loadGames(sport: string, league: League, date: string): Promise<CanonicalGame[]> {
    const resolved = this.registry.resolve(sport)
    if (!resolved.ok) throw resolved.error

    const provider = this.providerFor(resolved.config.name)
    const query = provider.gamesQuery(resolved.sport, resolved.endpoints, league, date)
    const payload = await this.http.get(resolved.config, resolved.sport, query)

    const games = this.parseEach(provider.gameItems(payload), `${sport}/${league.name} game`, (item) =>
      provider.parseGame(item, resolved.sport, league),
    )

    this.log(Severity.INF, `Fetched ${games.length} games for ${league.name} on ${date}`)
    return games
  }

  private parseEach<T>(items: unknown[], label: string, parse: (item: unknown) => T | null): T[] {
    const parsed: T[] = []

    items.forEach((item, index) => {
      try {
        const value = parse(item)
        if (value !== null) parsed.push(value)
      } catch (err) {
        this.log(Severity.WRN, `Skipping malformed ${label} #${index}: ${describeError(err)}`)
      }
    })

    return parsed
  }

  private providerFor(name: ProviderName): SportsProvider {
    let provider = this.providers.get(name)
    if (!provider) {
      provider = createProvider(name)
      this.providers.set(name, provider)
    }
    return provider
  }
}
