import type { QueryResultRow } from 'pg';
import { BaseRepository, toNumber } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { CreatePaymentInput, Payment, PaymentFilter, UpdatePaymentInput } from '../../connections/db/models';
import { NotFoundError } from '../../utils/errors';
import { createPaymentSchema, updatePaymentSchema } from './payment.validation';

export class PaymentRepository extends BaseRepository<Payment, CreatePaymentInput, UpdatePaymentInput, PaymentFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'payments',
      entity: 'Payment',
      createSchema: createPaymentSchema,
      updateSchema: updatePaymentSchema,
      filterColumns: ['order_id', 'status'],
    });
  }

  protected mapRow(row: QueryResultRow): Payment {
    return {
      id: row.id,
      order_id: row.order_id,
      amount: toNumber(row.amount),
      method: row.method,
      status: row.status,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  // An order has at most one payment
  protected async beforeCreate(input: CreatePaymentInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'orders', input.order_id, 'Order');
    await this.assertUnique(db, { order_id: input.order_id }, 'Order already has a payment');
  }

  async findByOrder(orderId: number, tx?: Queryable): Promise<Payment | undefined> {
    return this.findOneBy('order_id', orderId, tx);
  }

  async getByOrder(orderId: number, tx?: Queryable): Promise<Payment> {
    const payment = await this.findByOrder(orderId, tx);
    if (!payment) {
      throw new NotFoundError(`Payment for order ${orderId} not found`, { order_id: orderId });
    }
    return payment;
  }
}
