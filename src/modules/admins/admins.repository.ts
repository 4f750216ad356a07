import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { Admin, AdminFilter, CreateAdminInput, UpdateAdminInput } from '../../connections/db/models';
import { createAdminSchema, updateAdminSchema } from './admins.validation';

export class AdminRepository extends BaseRepository<Admin, CreateAdminInput, UpdateAdminInput, AdminFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'admins',
      entity: 'Admin',
      createSchema: createAdminSchema,
      updateSchema: updateAdminSchema,
      filterColumns: ['access_level'],
    });
  }

  protected mapRow(row: QueryResultRow): Admin {
    return {
      id: row.id,
      user_id: row.user_id,
      access_level: row.access_level,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateAdminInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'users', input.user_id, 'User');
    await this.assertUnique(db, { user_id: input.user_id }, 'User is already an admin');
  }

  async findByUserId(userId: number, tx?: Queryable): Promise<Admin | undefined> {
    return this.findOneBy('user_id', userId, tx);
  }
}
