import type { QueryResultRow } from 'pg';
import { BaseRepository, toNumber } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { CreateOrderInput, Order, OrderFilter, UpdateOrderInput } from '../../connections/db/models';
import { createOrderSchema, updateOrderSchema } from './orders.validation';

export class OrderRepository extends BaseRepository<Order, CreateOrderInput, UpdateOrderInput, OrderFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'orders',
      entity: 'Order',
      createSchema: createOrderSchema,
      updateSchema: updateOrderSchema,
      filterColumns: ['user_id', 'status'],
    });
  }

  protected mapRow(row: QueryResultRow): Order {
    return {
      id: row.id,
      user_id: row.user_id,
      status: row.status,
      total_amount: toNumber(row.total_amount),
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateOrderInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'users', input.user_id, 'User');
  }

  async listByUser(userId: number, tx?: Queryable): Promise<Order[]> {
    return this.list({ user_id: userId }, {}, tx);
  }
}
