#!/usr/bin/env -S npx tsx

import yargs from "yargs";
import { hideBin } from 'yargs/helpers'
import pkg from './package.json' with {type: 'json'}

import 'dotenv/config'

import { SportsSync } from "./src/sports-sync.js";
import { Sport } from "./src/config.js";

await main()

async function main() {
  // setup CLI parser

  await yargs()
    .scriptName('betsync')
    .usage('$0 <cmd> [args]')
    .help()
    .epilogue('All args can also be set via environment variables prefixed with BETSYNC_.\n' +
      'For example, --rapidapi-key can be set as BETSYNC_RAPIDAPI_KEY.')
    .alias('help', 'h')
    .strictCommands()
    .recommendCommands()
    .version(pkg.version)
    .env('BETSYNC')
    .options({
      'db-filename': {
        alias: 'f',
        describe: 'sqlite database filename',
        type: 'string',
        default: 'db.sqlite'
      },
      'api-sports-key': {
        describe: 'API key for api-sports.io (football, basketball, hockey, ...)',
        type: 'string'
      },
      'rapidapi-key': {
        describe: 'RapidAPI key (darts, tennis, golf)',
        type: 'string'
      },
      'request-timeout-ms': {
        describe: 'per-request timeout',
        type: 'number',
        default: 10000
      },
      'rate-limit-backoff-ms': {
        describe: 'wait before retrying a request the provider rate limited (429)',
        type: 'number',
        default: 60000
      },
    })
    .command('providers', 'List providers, their sports and whether they are configured', {},
      (argv) => new SportsSync(argv).providers())
    .command('discover-leagues', 'Discover leagues / tournaments for a sport', {
      'sport': {
        describe: 'Sport key',
        type: 'string',
        required: true,
        choices: Sport.options
      }
    }, (argv) => new SportsSync(argv).discoverLeagues())
    .command('fetch-games', 'Fetch and store games for one league on one date', {
      'sport': {
        describe: 'Sport key',
        type: 'string',
        required: true,
        choices: Sport.options
      },
      'league': {
        describe: 'League / tournament id (see discover-leagues)',
        type: 'string',
        required: true
      },
      'date': {
        describe: 'Date (YYYY-MM-DD), defaults to today',
        type: 'string'
      }
    }, (argv) => new SportsSync(argv).fetchGames())
    .command('sweep', 'Discover leagues for every sport and store their upcoming games', {
      'sport': {
        describe: 'Restrict to these sports',
        type: 'array',
        choices: Sport.options
      },
      'date': {
        describe: 'First date (YYYY-MM-DD), defaults to today',
        type: 'string'
      },
      'next-days': {
        describe: 'Number of days to fetch starting at --date',
        type: 'number',
        default: 2
      },
      'major-only': {
        describe: 'Only fetch leagues on the major-league allow-list',
        type: 'boolean',
        default: true
      },
      'sport-delay-ms': {
        describe: 'Pause between sports during discovery',
        type: 'number',
        default: 2000
      },
      'request-delay-ms': {
        describe: 'Pause between games requests',
        type: 'number',
        default: 1500
      },
      'repeat': {
        describe: 'Keep sweeping on a fixed interval until interrupted',
        type: 'boolean',
        default: false
      },
      'interval-minutes': {
        describe: 'Interval between repeated sweeps, aligned to the clock',
        type: 'number',
        default: 60
      },
      'retry-delay-ms': {
        describe: 'Wait before retrying a repeated sweep that failed',
        type: 'number',
        default: 300000
      }
    }, (argv) => new SportsSync(argv).sweep())
    .command('stats', 'Show totals of stored games, leagues and sports', {},
      (argv) => new SportsSync(argv).stats())
    .command('games', 'List stored games', {
      'sport': {
        describe: 'Sport key',
        type: 'string',
        choices: Sport.options
      },
      'limit': {
        describe: 'Max rows',
        type: 'number',
        default: 25
      }
    }, (argv) => new SportsSync(argv).listGames())
    .parse(hideBin(process.argv))
}
