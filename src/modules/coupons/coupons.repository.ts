import type { QueryResultRow } from 'pg';
import { BaseRepository, toNumber } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { Coupon, CouponFilter, CreateCouponInput, UpdateCouponInput } from '../../connections/db/models';
import { ValidationError } from '../../utils/errors';
import { createCouponSchema, updateCouponSchema } from './coupons.validation';

export class CouponRepository extends BaseRepository<Coupon, CreateCouponInput, UpdateCouponInput, CouponFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'coupons',
      entity: 'Coupon',
      createSchema: createCouponSchema,
      updateSchema: updateCouponSchema,
      filterColumns: ['is_active', 'discount_type'],
    });
  }

  protected mapRow(row: QueryResultRow): Coupon {
    return {
      id: row.id,
      code: row.code,
      discount_type: row.discount_type,
      discount_value: toNumber(row.discount_value),
      is_active: row.is_active,
      expires_at: row.expires_at ?? null,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateCouponInput, db: Queryable): Promise<void> {
    await this.assertUniqueIgnoringCase(db, 'code', input.code, 'Coupon code already exists');
  }

  protected async beforeUpdate(existing: Coupon, input: UpdateCouponInput): Promise<void> {
    const type = input.discount_type ?? existing.discount_type;
    const value = input.discount_value ?? existing.discount_value;
    if (type === 'percentage' && value > 100) {
      throw new ValidationError('Percentage discount cannot exceed 100', { discount_value: value });
    }
  }

  async findByCode(code: string, tx?: Queryable): Promise<Coupon | undefined> {
    return this.findOneByIgnoringCase('code', code, tx);
  }
}
