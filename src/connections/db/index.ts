export { pool, connectDatabase } from './connection';
export { runMigrations, rollbackLastMigration } from './migrate';
export { withTransaction } from './transaction';
export { BaseRepository } from './base.repository';
export type { ListOptions, RepositoryDefinition } from './base.repository';
export type { Queryable } from './queryable';
