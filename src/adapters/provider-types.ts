import type { ProviderName, Sport } from '../config.js';

export type { ProviderName, Sport } from '../config.js';

// Registry types

export type ProviderAuth =
  | { type: 'none' }
  | { type: 'header'; header: string }
  | { type: 'query'; param: string }
  | { type: 'rapidapi'; host: string };

export interface ProviderConfig {
  name: ProviderName;
  baseUrls: Partial<Record<Sport, string>>;
  auth: ProviderAuth;
  apiKey?: string;
  /** calls per rolling minute */
  rateLimit: number;
}

export interface EndpointConfig {
  leagues: string;
  games: string;
}

// Normalized shapes

export interface League {
  id: string;
  name: string;
  type: string;
  logo: string;
  country: string;
  countryCode: string;
  flag: string;
  season: number;
  sport: Sport;
  provider: ProviderName;
}

export interface GameScore {
  home: number | null;
  away: number | null;
}

export interface CanonicalGame {
  apiGameId: string;
  sport: Sport;
  leagueId: string;
  leagueName: string;
  season: number;
  homeTeamName: string;
  awayTeamName: string;
  // raw provider timestamps, parsed when persisted
  startTime: string | null;
  endTime: string | null;
  status: string;
  score: GameScore | null;
  venue: string | null;
  provider: ProviderName;
  raw: unknown;
}

// Request description handed to the HTTP client

export type QueryParams = Record<string, string | number>;

export interface ProviderQuery {
  path: string;
  params: QueryParams;
}

/**
 * One implementation per upstream. The client picks it once through the
 * registry and never branches on the provider name.
 */
export interface SportsProvider {
  readonly name: ProviderName;

  leaguesQuery(sport: Sport, endpoints: EndpointConfig, today: string): ProviderQuery;
  /** Unwrap the discovery payload into raw league items. */
  leagueItems(payload: unknown): unknown[];
  /** Returns null for items that are not leagues (e.g. missing id). Throws on malformed items. */
  parseLeague(item: unknown, sport: Sport, season: number): League | null;

  gamesQuery(sport: Sport, endpoints: EndpointConfig, league: League, date: string): ProviderQuery;
  /** Unwrap the games payload into raw game items, flattening any grouping. */
  gameItems(payload: unknown): unknown[];
  /**
   * Returns null for items that belong to another league (feeds that cannot
   * filter by league server-side). Throws on malformed items.
   */
  parseGame(item: unknown, sport: Sport, league: League): CanonicalGame | null;
}

export interface SweepResult {
  totalLeagues: number;
  successfulFetches: number;
  failedFetches: number;
  totalGames: number;
  savedGames: number;
  failedSaves: number;
  /** `sport/league name` of every league whose fetch failed */
  failedLeagues: string[];
}

export interface StoredTotals {
  totalGames: number;
  uniqueLeagues: number;
  uniqueSports: number;
}

export interface FetchStatistics extends StoredTotals {
  failedLeagues: string[];
  successfulFetches: number;
  totalFetches: number;
}

export interface SweepOptions {
  date: string;
  nextDays: number;
  majorOnly: boolean;
}
