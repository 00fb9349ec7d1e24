import { defineConfig } from 'drizzle-kit';

const getDatabaseUrl = () => {
  const diaryDbUrl = process.env.DIARY_DATABASE_URL || process.env.DATABASE_URL;
  if (!diaryDbUrl) {
    throw new Error('DIARY_DATABASE_URL (preferred) or DATABASE_URL environment variable is required for diary-service.');
  }
  return diaryDbUrl;
};

export default defineConfig({
  schema: './src/schema/diary-schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  tablesFilter: ['diary_*'],
  verbose: true,
  strict: true,
});
