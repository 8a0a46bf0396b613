import { Sport as SportSchema, type GlobalConfig } from '../config.js';
import { ProviderError } from './errors.js';
import type { EndpointConfig, ProviderConfig, ProviderName, Sport } from './provider-types.js';

const API_SPORTS_SPORTS = [
  'football',
  'basketball',
  'baseball',
  'hockey',
  'american-football',
  'rugby',
  'volleyball',
  'handball',
  'afl',
  'formula-1',
  'mma',
] as const satisfies readonly Sport[];

const API_SPORTS_HOSTS: Record<(typeof API_SPORTS_SPORTS)[number], string> = {
  football: 'https://v3.football.api-sports.io',
  basketball: 'https://v1.basketball.api-sports.io',
  baseball: 'https://v1.baseball.api-sports.io',
  hockey: 'https://v1.hockey.api-sports.io',
  'american-football': 'https://v1.american-football.api-sports.io',
  rugby: 'https://v1.rugby.api-sports.io',
  volleyball: 'https://v1.volleyball.api-sports.io',
  handball: 'https://v1.handball.api-sports.io',
  afl: 'https://v1.afl.api-sports.io',
  'formula-1': 'https://v1.formula-1.api-sports.io',
  mma: 'https://v1.mma.api-sports.io',
};

const API_SPORTS_GAMES_PATH: Partial<Record<Sport, string>> = {
  football: '/fixtures',
  'formula-1': '/races',
  mma: '/fights',
};

export const SPORT_PROVIDER: Readonly<Record<Sport, ProviderName>> = {
  football: 'api-sports',
  basketball: 'api-sports',
  baseball: 'api-sports',
  hockey: 'api-sports',
  'american-football': 'api-sports',
  rugby: 'api-sports',
  volleyball: 'api-sports',
  handball: 'api-sports',
  afl: 'api-sports',
  'formula-1': 'api-sports',
  mma: 'api-sports',
  esports: 'sportdevs',
  darts: 'rapidapi-darts',
  tennis: 'rapidapi-tennis',
  golf: 'rapidapi-golf',
};

type KeySource = 'api-sports-key' | 'rapidapi-key';

interface ProviderDefinition extends Omit<ProviderConfig, 'apiKey'> {
  keySource?: KeySource;
  endpoints: Partial<Record<Sport, EndpointConfig>>;
}

const PROVIDERS: readonly ProviderDefinition[] = [
  {
    name: 'api-sports',
    baseUrls: API_SPORTS_HOSTS,
    auth: { type: 'header', header: 'x-apisports-key' },
    keySource: 'api-sports-key',
    rateLimit: 30,
    endpoints: Object.fromEntries(
      API_SPORTS_SPORTS.map((sport) => [sport, { leagues: '/leagues', games: API_SPORTS_GAMES_PATH[sport] ?? '/games' }]),
    ),
  },
  {
    name: 'sportdevs',
    baseUrls: { esports: 'https://esports.sportdevs.com' },
    auth: { type: 'none' },
    rateLimit: 60,
    endpoints: { esports: { leagues: '/tournaments', games: '/matches' } },
  },
  {
    name: 'rapidapi-darts',
    baseUrls: { darts: 'https://darts-devs.p.rapidapi.com' },
    auth: { type: 'rapidapi', host: 'darts-devs.p.rapidapi.com' },
    keySource: 'rapidapi-key',
    rateLimit: 30,
    endpoints: { darts: { leagues: '/tournaments-by-league', games: '/matches-by-date' } },
  },
  {
    name: 'rapidapi-tennis',
    baseUrls: { tennis: 'https://tennis-devs.p.rapidapi.com' },
    auth: { type: 'rapidapi', host: 'tennis-devs.p.rapidapi.com' },
    keySource: 'rapidapi-key',
    rateLimit: 100,
    endpoints: { tennis: { leagues: '/tournaments', games: '/matches-by-date' } },
  },
  {
    name: 'rapidapi-golf',
    baseUrls: { golf: 'https://livegolfapi.p.rapidapi.com' },
    auth: { type: 'rapidapi', host: 'livegolfapi.p.rapidapi.com' },
    keySource: 'rapidapi-key',
    rateLimit: 30,
    // golf has no league listing, tournaments come out of the events feed
    endpoints: { golf: { leagues: '/v1/events', games: '/v1/events' } },
  },
];

export interface ProviderStatus {
  name: ProviderName;
  sports: Sport[];
  rateLimit: number;
  available: boolean;
}

export type ResolveResult =
  | { ok: true; sport: Sport; config: ProviderConfig; endpoints: EndpointConfig }
  | { ok: false; error: ProviderError };

/**
 * Immutable lookup for "how do I call provider X for sport Y". Built once
 * from the global config; API keys are resolved at construction.
 */
export class ProviderRegistry {
  private readonly configs: ReadonlyMap<ProviderName, Readonly<ProviderConfig>>;
  private readonly endpoints: ReadonlyMap<ProviderName, Partial<Record<Sport, EndpointConfig>>>;

  constructor(config: Pick<GlobalConfig, KeySource>) {
    const configs = new Map<ProviderName, Readonly<ProviderConfig>>();
    const endpoints = new Map<ProviderName, Partial<Record<Sport, EndpointConfig>>>();

    for (const def of PROVIDERS) {
      const { keySource, endpoints: eps, ...rest } = def;
      const apiKey = keySource ? config[keySource] : undefined;
      configs.set(def.name, Object.freeze({
        ...rest,
        baseUrls: Object.freeze({ ...rest.baseUrls }),
        ...(apiKey ? { apiKey } : {}),
      }));
      endpoints.set(def.name, Object.freeze({ ...eps }));
    }

    this.configs = configs;
    this.endpoints = endpoints;
    Object.freeze(this);
  }

  get sports(): Sport[] {
    return [...SportSchema.options];
  }

  get providers(): Readonly<ProviderConfig>[] {
    return [...this.configs.values()];
  }

  isAvailable(config: ProviderConfig): boolean {
    return config.auth.type === 'none' || Boolean(config.apiKey);
  }

  resolve(sport: string): ResolveResult {
    if (!isSport(sport)) {
      return { ok: false, error: ProviderError.unsupportedSport(sport) };
    }

    const name = SPORT_PROVIDER[sport];
    const config = this.configs.get(name);
    const endpoints = this.endpoints.get(name)?.[sport];
    if (!config || !endpoints || !config.baseUrls[sport]) {
      return { ok: false, error: ProviderError.missingEndpoint(name, sport) };
    }

    if (!this.isAvailable(config)) {
      return { ok: false, error: ProviderError.unavailable(name, 'API key not configured') };
    }

    return { ok: true, sport, config, endpoints };
  }

  status(): ProviderStatus[] {
    return this.providers.map((config) => ({
      name: config.name,
      sports: this.sports.filter((sport) => SPORT_PROVIDER[sport] === config.name),
      rateLimit: config.rateLimit,
      available: this.isAvailable(config),
    }));
  }
}

function isSport(value: string): value is Sport {
  return SportSchema.safeParse(value).success;
}
