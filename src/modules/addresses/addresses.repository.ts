import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CreateUserAddressInput,
  UpdateUserAddressInput,
  UserAddress,
  UserAddressFilter,
} from '../../connections/db/models';
import { createAddressSchema, updateAddressSchema } from './addresses.validation';

export class UserAddressRepository extends BaseRepository<
  UserAddress,
  CreateUserAddressInput,
  UpdateUserAddressInput,
  UserAddressFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'user_addresses',
      entity: 'Address',
      createSchema: createAddressSchema,
      updateSchema: updateAddressSchema,
      filterColumns: ['user_id'],
    });
  }

  protected mapRow(row: QueryResultRow): UserAddress {
    return {
      id: row.id,
      user_id: row.user_id,
      line1: row.line1,
      line2: row.line2 ?? null,
      city: row.city,
      postal_code: row.postal_code,
      country: row.country,
      is_default: row.is_default,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateUserAddressInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'users', input.user_id, 'User');
    if (input.is_default) {
      await this.clearDefault(db, input.user_id);
    }
  }

  protected async beforeUpdate(existing: UserAddress, input: UpdateUserAddressInput, db: Queryable): Promise<void> {
    if (input.is_default) {
      await this.clearDefault(db, existing.user_id);
    }
  }

  async listByUser(userId: number, tx?: Queryable): Promise<UserAddress[]> {
    return this.list({ user_id: userId }, {}, tx);
  }

  // At most one default address per user
  private async clearDefault(db: Queryable, userId: number): Promise<void> {
    await db.query(
      'UPDATE user_addresses SET is_default = FALSE, updated_at = NOW() WHERE user_id = $1 AND is_default = TRUE',
      [userId]
    );
  }
}
