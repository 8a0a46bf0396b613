// Provider barrel export
//
//   import { createProvider, type SportsProvider } from './adapters/providers/index.js'

import type { ProviderName, SportsProvider } from '../provider-types.js'
import { ApiSportsProvider } from './api-sports.js'
import { DevsRapidApiProvider } from './rapidapi-devs.js'
import { RapidApiGolfProvider } from './rapidapi-golf.js'
import { SportDevsProvider } from './sportdevs.js'

export { ApiSportsProvider } from './api-sports.js'
export { DevsRapidApiProvider } from './rapidapi-devs.js'
export { RapidApiGolfProvider } from './rapidapi-golf.js'
export { SportDevsProvider } from './sportdevs.js'
export { SportDevsQuery, endpoint } from './sportdevs-query.js'
export type { SportsProvider } from '../provider-types.js'

/**
 * The single place where provider name → implementation mapping lives.
 * Adding a provider means:
 *   1. Create a class implementing `SportsProvider`
 *   2. Add a case here
 *   3. Add it to `ProviderName` in config.ts and to the registry table
 */
export function createProvider(name: ProviderName): SportsProvider {
  switch (name) {
    case 'api-sports':
      return new ApiSportsProvider()

    case 'sportdevs':
      return new SportDevsProvider()

    case 'rapidapi-darts':
    case 'rapidapi-tennis':
      return new DevsRapidApiProvider(name)

    case 'rapidapi-golf':
      return new RapidApiGolfProvider()

    default: {
      const _exhaustive: never = name
      throw new Error(`Unknown provider: ${String(_exhaustive)}`)
    }
  }
}
