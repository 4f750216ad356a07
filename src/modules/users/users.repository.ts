import bcrypt from 'bcryptjs';
import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CreateUserInput,
  UpdateUserInput,
  User,
  UserCredentials,
  UserFilter,
} from '../../connections/db/models';
import { appConfig } from '../../connections/config/app.config';
import { createUserSchema, updateUserSchema } from './users.validation';

export class UserRepository extends BaseRepository<User, CreateUserInput, UpdateUserInput, UserFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'users',
      entity: 'User',
      createSchema: createUserSchema,
      updateSchema: updateUserSchema,
      filterColumns: ['role', 'email'],
    });
  }

  protected mapRow(row: QueryResultRow): User {
    return {
      id: row.id,
      email: row.email,
      full_name: row.full_name,
      phone: row.phone ?? null,
      role: row.role,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateUserInput, db: Queryable): Promise<void> {
    await this.assertUniqueIgnoringCase(db, 'email', input.email, 'Email already registered');
  }

  protected async beforeUpdate(existing: User, input: UpdateUserInput, db: Queryable): Promise<void> {
    if (input.email && input.email !== existing.email) {
      await this.assertUniqueIgnoringCase(db, 'email', input.email, 'Email already registered', existing.id);
    }
  }

  protected async toCreateColumns(input: CreateUserInput): Promise<Record<string, unknown>> {
    const { password, ...rest } = input;
    return this.withoutUndefined({
      ...rest,
      password_hash: await bcrypt.hash(password, appConfig.bcryptRounds),
    });
  }

  protected async toUpdateColumns(input: UpdateUserInput): Promise<Record<string, unknown>> {
    const { password, ...rest } = input;
    return this.withoutUndefined({
      ...rest,
      password_hash: password === undefined ? undefined : await bcrypt.hash(password, appConfig.bcryptRounds),
    });
  }

  async findByEmail(email: string, tx?: Queryable): Promise<User | undefined> {
    return this.findOneByIgnoringCase('email', email, tx);
  }

  async findCredentialsByEmail(email: string): Promise<UserCredentials | undefined> {
    const result = await this.db.query(
      'SELECT id, email, password_hash FROM users WHERE LOWER(email) = LOWER($1) ORDER BY id ASC LIMIT 1',
      [email.trim()]
    );
    const row = result.rows[0];
    if (!row) {
      return undefined;
    }
    return { id: row.id, email: row.email, password_hash: row.password_hash };
  }

  async verifyPassword(credentials: UserCredentials, password: string): Promise<boolean> {
    return bcrypt.compare(password, credentials.password_hash);
  }

  private withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
  }
}
