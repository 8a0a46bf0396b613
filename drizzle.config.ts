import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/db/schema.ts',
  out: './drizzle',
  dialect: 'sqlite',
  casing: 'snake_case',
  dbCredentials: {
    url: 'file:' + (process.env.BETSYNC_DB_FILENAME ?? 'db.sqlite'),
  },
});
