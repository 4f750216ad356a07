import type { QueryResultRow } from 'pg';
import { BaseRepository, toNumber } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CreateOrderItemInput,
  OrderItem,
  OrderItemFilter,
  UpdateOrderItemInput,
} from '../../connections/db/models';
import { createOrderItemSchema, updateOrderItemSchema } from './orders.validation';

/**
 * Order <-> Product many-to-many, with quantity and price at purchase.
 */
export class OrderItemRepository extends BaseRepository<
  OrderItem,
  CreateOrderItemInput,
  UpdateOrderItemInput,
  OrderItemFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'order_items',
      entity: 'Order item',
      createSchema: createOrderItemSchema,
      updateSchema: updateOrderItemSchema,
      filterColumns: ['order_id', 'product_id'],
      touchUpdatedAt: false,
    });
  }

  protected mapRow(row: QueryResultRow): OrderItem {
    return {
      id: row.id,
      order_id: row.order_id,
      product_id: row.product_id,
      quantity: row.quantity,
      unit_price: toNumber(row.unit_price),
      created_at: row.created_at,
    };
  }

  protected async beforeCreate(input: CreateOrderItemInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'orders', input.order_id, 'Order');
    await this.assertReferenceExists(db, 'products', input.product_id, 'Product');
  }

  async listByOrder(orderId: number, tx?: Queryable): Promise<OrderItem[]> {
    return this.list({ order_id: orderId }, {}, tx);
  }
}
