import { defineConfig } from 'drizzle-kit';

// Migrations for the access_grants table, generated from the Drizzle schema.
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './drizzle',
  tablesFilter: ['access_grants'],
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/pet_access',
  },
});
