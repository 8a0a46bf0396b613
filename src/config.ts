import * as z from 'zod'

export const Sport = z.enum([
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
  'darts',
  'esports',
  'tennis',
  'golf',
])

export const ProviderName = z.enum([
  'api-sports',
  'sportdevs',
  'rapidapi-darts',
  'rapidapi-tennis',
  'rapidapi-golf',
])

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')

export function today(): string {
  return new Date().toISOString().slice(0, 10)
}

export const GlobalConfig = z.object({
  'db-filename': z.string().default('db.sqlite'),
  'api-sports-key': z.string().optional(),
  'rapidapi-key': z.string().optional(),
  'request-timeout-ms': z.number().int().min(1).default(10_000),
  'rate-limit-backoff-ms': z.number().int().min(0).default(60_000),
})

export const DiscoverConfig = GlobalConfig.extend({
  sport: Sport,
})

export const FetchGamesConfig = GlobalConfig.extend({
  sport: Sport,
  league: z.coerce.string(),
  date: IsoDate.default(today),
})

export const SweepConfig = GlobalConfig.extend({
  sport: z.array(Sport).optional(),
  date: IsoDate.default(today),
  'next-days': z.number().int().min(1).default(2),
  'major-only': z.boolean().default(true),

  // pacing on top of the per-provider limiter
  'sport-delay-ms': z.number().int().min(0).default(2000),
  'request-delay-ms': z.number().int().min(0).default(1500),

  // keep sweeping on a fixed interval
  repeat: z.boolean().default(false),
  'interval-minutes': z.number().int().min(1).default(60),
  'retry-delay-ms': z.number().int().min(0).default(300_000),
})

export const ListGamesConfig = GlobalConfig.extend({
  sport: Sport.optional(),
  limit: z.number().int().min(1).default(25),
})

export type Sport = z.infer<typeof Sport>
export type ProviderName = z.infer<typeof ProviderName>
export type GlobalConfig = z.infer<typeof GlobalConfig>
export type DiscoverConfig = z.infer<typeof DiscoverConfig>
export type FetchGamesConfig = z.infer<typeof FetchGamesConfig>
export type SweepConfig = z.infer<typeof SweepConfig>
export type ListGamesConfig = z.infer<typeof ListGamesConfig>
