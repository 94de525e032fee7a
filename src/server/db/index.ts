/**
 * Database facade - picks SQLite (dev/test) or PostgreSQL (prod).
 *
 * The repository is created once at startup and passed to the services that
 * need it; nothing else holds a connection.
 */

import type { Config } from '../../lib/config';
import type { ThemeRepository } from './types';

export type {
  DbUser,
  DbTheme,
  PublicThemeSummary,
  CreateThemeParams,
  ThemeRepository,
  Visibility,
} from './types';

export async function initDatabase(
  config: Pick<Config, 'useSqlite' | 'sqlitePath' | 'databaseUrl'>
): Promise<ThemeRepository> {
  if (config.useSqlite) {
    // Adapters are imported lazily so production never loads the native SQLite binding
    const { openSqlite, SqliteRepository } = await import('./sqlite');
    const repository = new SqliteRepository(openSqlite(config.sqlitePath));
    console.log('✅ SQLite database initialized');
    return repository;
  }

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when SQLite is disabled');
  }
  const { initPostgres } = await import('./postgres');
  return initPostgres(config.databaseUrl);
}
