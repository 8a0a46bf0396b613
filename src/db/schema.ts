import { int, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import id128 from "id128";

// every time column is unix seconds
export const unixNow = () => Math.floor(Date.now() / 1000);

export const logs = sqliteTable('logs', {
  id: text().$defaultFn(() => id128.Ulid.generate().toCanonical()).primaryKey(),

  severity: int().notNull(),
  data: text(),
})

export const apiGames = sqliteTable("api_games", {
  id: text().$defaultFn(() => id128.Ulid.generate().toCanonical()).primaryKey(),

  // natural key
  apiGameId: text("api_game_id").notNull(), // provider's game/match identifier
  sport: text().notNull(),
  leagueId: text("league_id").notNull(),
  season: int().notNull(),

  leagueName: text("league_name"),
  provider: text().notNull(),

  // Game details
  homeTeamName: text("home_team_name"),
  awayTeamName: text("away_team_name"),
  startTime: int("start_time"),
  endTime: int("end_time"),
  status: text(),
  score: text(), // JSON { home, away }
  venue: text(),

  // Raw data from the provider
  rawJson: text("raw_json").notNull(),
  fetchedAt: int("fetched_at").notNull(),

  // Metadata
  createdAt: int("created_at").notNull().$defaultFn(unixNow),
  updatedAt: int("updated_at").notNull().$defaultFn(unixNow),
}, (table) => [
  uniqueIndex("api_games_natural_key").on(table.sport, table.leagueId, table.season, table.apiGameId),
]);
