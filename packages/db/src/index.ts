export { createClient, disconnect, ping, type Database, type DbClient, type DbClientOptions } from './client.js';
export { runMigrations, listMigrationFiles, MIGRATIONS_DIR, type MigrateResult, type MigrationFile } from './migrate.js';
export * as schema from './schema.js';
export type { MarketRow, UserTransactionRow, IngestionRunRow } from './schema.js';
export * from './repositories/index.js';
