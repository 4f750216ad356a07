import type { QueryResultRow } from 'pg';
import type { z } from 'zod';
import type { Queryable } from './queryable';
import { NotFoundError, ValidationError } from '../../utils/errors';

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface RepositoryDefinition<TCreate, TUpdate, TFilter> {
  /** SQL table name */
  table: string;
  /** Human readable name used in error messages */
  entity: string;
  createSchema: z.ZodType<TCreate>;
  updateSchema: z.ZodType<TUpdate>;
  /** Columns `list()` may filter on */
  filterColumns: ReadonlyArray<keyof TFilter & string>;
  /** Whether the table has an `updated_at` column to touch on update */
  touchUpdatedAt?: boolean;
}

/**
 * CRUD access object over a single table.
 *
 * Input is validated against the entity's zod schemas before any SQL runs, so
 * callers get a ValidationError for malformed attributes and a NotFoundError for
 * ids that do not exist. Subclasses add reference and cardinality checks through
 * the `before*` hooks, which receive the same queryable as the statement
 * (the pool, or a transaction client).
 */
export abstract class BaseRepository<
  TEntity extends { id: number },
  TCreate extends object,
  TUpdate extends object,
  TFilter extends object = Record<string, never>,
> {
  protected constructor(
    protected readonly db: Queryable,
    protected readonly definition: RepositoryDefinition<TCreate, TUpdate, TFilter>
  ) {}

  protected abstract mapRow(row: QueryResultRow): TEntity;

  protected async beforeCreate(_input: TCreate, _db: Queryable): Promise<void> {}

  protected async beforeUpdate(_existing: TEntity, _input: TUpdate, _db: Queryable): Promise<void> {}

  protected async beforeDelete(_existing: TEntity, _db: Queryable): Promise<void> {}

  /** Column values written by `create`. Override to derive stored columns (e.g. hashes). */
  protected async toCreateColumns(input: TCreate): Promise<Record<string, unknown>> {
    return compact(input);
  }

  protected async toUpdateColumns(input: TUpdate): Promise<Record<string, unknown>> {
    return compact(input);
  }

  get entity(): string {
    return this.definition.entity;
  }

  async create(input: TCreate, tx?: Queryable): Promise<TEntity> {
    const db = tx ?? this.db;
    const data = this.parse(this.definition.createSchema, input);
    await this.beforeCreate(data, db);

    const values = await this.toCreateColumns(data);
    const columns = Object.keys(values);
    const sql = columns.length
      ? `INSERT INTO ${this.definition.table} (${columns.join(', ')})
         VALUES (${columns.map((_, i) => `$${i + 1}`).join(', ')})
         RETURNING *`
      : `INSERT INTO ${this.definition.table} DEFAULT VALUES RETURNING *`;

    const result = await db.query(sql, Object.values(values));
    return this.mapRow(result.rows[0]);
  }

  async findById(id: number, tx?: Queryable): Promise<TEntity | undefined> {
    return this.findOneBy('id', id, tx);
  }

  async get(id: number, tx?: Queryable): Promise<TEntity> {
    const entity = await this.findById(id, tx);
    if (!entity) {
      throw NotFoundError.entity(this.definition.entity, id);
    }
    return entity;
  }

  async exists(id: number, tx?: Queryable): Promise<boolean> {
    return (await this.findById(id, tx)) !== undefined;
  }

  async update(id: number, input: TUpdate, tx?: Queryable): Promise<TEntity> {
    const db = tx ?? this.db;
    const data = this.parse(this.definition.updateSchema, input);
    const existing = await this.get(id, db);
    await this.beforeUpdate(existing, data, db);

    const values = await this.toUpdateColumns(data);
    const columns = Object.keys(values);
    if (columns.length === 0) {
      return existing;
    }

    const assignments = columns.map((column, i) => `${column} = $${i + 1}`);
    if (this.definition.touchUpdatedAt !== false) {
      assignments.push('updated_at = NOW()');
    }

    const result = await db.query(
      `UPDATE ${this.definition.table} SET ${assignments.join(', ')}
       WHERE id = $${columns.length + 1}
       RETURNING *`,
      [...Object.values(values), id]
    );
    return this.mapRow(result.rows[0]);
  }

  async delete(id: number, tx?: Queryable): Promise<void> {
    const db = tx ?? this.db;
    const existing = await this.get(id, db);
    await this.beforeDelete(existing, db);
    await db.query(`DELETE FROM ${this.definition.table} WHERE id = $1`, [id]);
  }

  async list(filter: Partial<TFilter> = {}, options: ListOptions = {}, tx?: Queryable): Promise<TEntity[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    for (const column of this.definition.filterColumns) {
      const value = filter[column];
      if (value !== undefined) {
        values.push(value);
        conditions.push(`${column} = $${values.length}`);
      }
    }

    let sql = `SELECT * FROM ${this.definition.table}`;
    if (conditions.length) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += ' ORDER BY id ASC';

    if (options.limit !== undefined) {
      values.push(options.limit);
      sql += ` LIMIT $${values.length}`;
    }
    if (options.offset !== undefined) {
      values.push(options.offset);
      sql += ` OFFSET $${values.length}`;
    }

    return this.selectRows(sql, values, tx);
  }

  protected async findOneBy(column: string, value: unknown, tx?: Queryable): Promise<TEntity | undefined> {
    const rows = await this.selectRows(
      `SELECT * FROM ${this.definition.table} WHERE ${column} = $1 LIMIT 1`,
      [value],
      tx
    );
    return rows[0];
  }

  protected async selectRows(sql: string, values: unknown[] = [], tx?: Queryable): Promise<TEntity[]> {
    const result = await (tx ?? this.db).query(sql, values);
    return result.rows.map(row => this.mapRow(row));
  }

  /**
   * Fails with NotFoundError unless `table` has a row with the given id.
   */
  protected async assertReferenceExists(db: Queryable, table: string, id: number, entity: string): Promise<void> {
    const result = await db.query(`SELECT id FROM ${table} WHERE id = $1`, [id]);
    if (result.rows.length === 0) {
      throw NotFoundError.entity(entity, id);
    }
  }

  /**
   * Fails with ValidationError when a row already matches every column, used for
   * the UNIQUE constraints behind 1:1 and M:N relations.
   */
  protected async assertUnique(
    db: Queryable,
    match: Record<string, unknown>,
    message: string,
    excludeId?: number
  ): Promise<void> {
    const columns = Object.keys(match);
    const values: unknown[] = Object.values(match);
    let sql = `SELECT id FROM ${this.definition.table} WHERE ${columns.map((c, i) => `${c} = $${i + 1}`).join(' AND ')}`;
    if (excludeId !== undefined) {
      values.push(excludeId);
      sql += ` AND id <> $${values.length}`;
    }

    const result = await db.query(sql, values);
    if (result.rows.length > 0) {
      throw new ValidationError(message, match);
    }
  }

  /** Case-insensitive variant of `assertUnique` for a single text column. */
  protected async assertUniqueIgnoringCase(
    db: Queryable,
    column: string,
    value: string,
    message: string,
    excludeId?: number
  ): Promise<void> {
    const values: unknown[] = [value];
    let sql = `SELECT id FROM ${this.definition.table} WHERE LOWER(${column}) = LOWER($1)`;
    if (excludeId !== undefined) {
      values.push(excludeId);
      sql += ' AND id <> $2';
    }

    const result = await db.query(sql, values);
    if (result.rows.length > 0) {
      throw new ValidationError(message, { [column]: value });
    }
  }

  protected async findOneByIgnoringCase(column: string, value: string, tx?: Queryable): Promise<TEntity | undefined> {
    const rows = await this.selectRows(
      `SELECT * FROM ${this.definition.table} WHERE LOWER(${column}) = LOWER($1) ORDER BY id ASC LIMIT 1`,
      [value.trim()],
      tx
    );
    return rows[0];
  }

  protected parse<T>(schema: z.ZodType<T>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw ValidationError.fromZod(result.error, `Invalid ${this.definition.entity.toLowerCase()} data`);
    }
    return result.data;
  }
}

const compact = (input: object): Record<string, unknown> =>
  Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));

/** DECIMAL columns arrive as strings from node-postgres. */
export const toNumber = (value: unknown): number => (typeof value === 'number' ? value : Number(value));
