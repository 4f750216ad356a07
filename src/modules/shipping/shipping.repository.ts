import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CreateShippingInput,
  Shipping,
  ShippingFilter,
  UpdateShippingInput,
} from '../../connections/db/models';
import { NotFoundError } from '../../utils/errors';
import { createShippingSchema, updateShippingSchema } from './shipping.validation';

export class ShippingRepository extends BaseRepository<
  Shipping,
  CreateShippingInput,
  UpdateShippingInput,
  ShippingFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'shipping',
      entity: 'Shipping',
      createSchema: createShippingSchema,
      updateSchema: updateShippingSchema,
      filterColumns: ['order_id', 'status'],
    });
  }

  protected mapRow(row: QueryResultRow): Shipping {
    return {
      id: row.id,
      order_id: row.order_id,
      address: row.address,
      carrier: row.carrier ?? null,
      tracking_number: row.tracking_number ?? null,
      status: row.status,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  // An order ships to exactly one address
  protected async beforeCreate(input: CreateShippingInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'orders', input.order_id, 'Order');
    await this.assertUnique(db, { order_id: input.order_id }, 'Order already has a shipping record');
  }

  async findByOrder(orderId: number, tx?: Queryable): Promise<Shipping | undefined> {
    return this.findOneBy('order_id', orderId, tx);
  }

  async getByOrder(orderId: number, tx?: Queryable): Promise<Shipping> {
    const shipping = await this.findByOrder(orderId, tx);
    if (!shipping) {
      throw new NotFoundError(`Shipping for order ${orderId} not found`, { order_id: orderId });
    }
    return shipping;
  }
}
