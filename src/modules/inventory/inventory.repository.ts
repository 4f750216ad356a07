import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CreateInventoryInput,
  Inventory,
  InventoryFilter,
  UpdateInventoryInput,
} from '../../connections/db/models';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { createInventorySchema, updateInventorySchema } from './inventory.validation';

export class InventoryRepository extends BaseRepository<
  Inventory,
  CreateInventoryInput,
  UpdateInventoryInput,
  InventoryFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'inventory',
      entity: 'Inventory',
      createSchema: createInventorySchema,
      updateSchema: updateInventorySchema,
      filterColumns: ['product_id'],
    });
  }

  protected mapRow(row: QueryResultRow): Inventory {
    return {
      id: row.id,
      product_id: row.product_id,
      stock_quantity: row.stock_quantity,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  // One inventory record per product
  protected async beforeCreate(input: CreateInventoryInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'products', input.product_id, 'Product');
    await this.assertUnique(db, { product_id: input.product_id }, 'Product already has an inventory record');
  }

  async findByProduct(productId: number, tx?: Queryable): Promise<Inventory | undefined> {
    return this.findOneBy('product_id', productId, tx);
  }

  async getByProduct(productId: number, tx?: Queryable): Promise<Inventory> {
    const inventory = await this.findByProduct(productId, tx);
    if (!inventory) {
      throw new NotFoundError(`Inventory for product ${productId} not found`, { product_id: productId });
    }
    return inventory;
  }

  /**
   * Add `delta` (negative to remove) to a product's stock in a single statement.
   * Fails with ValidationError instead of letting the count drop below zero.
   */
  async adjust(productId: number, delta: number, tx?: Queryable): Promise<Inventory> {
    const db = tx ?? this.db;
    const result = await db.query(
      `UPDATE inventory
       SET stock_quantity = stock_quantity + $1, updated_at = NOW()
       WHERE product_id = $2 AND stock_quantity + $1 >= 0
       RETURNING *`,
      [delta, productId]
    );

    if (result.rows.length === 0) {
      const current = await this.getByProduct(productId, db);
      throw insufficientStock(current, -delta);
    }

    return this.mapRow(result.rows[0]);
  }

  /** Fails unless the product currently holds at least `quantity` units. Writes nothing. */
  async assertAvailable(productId: number, quantity: number, tx?: Queryable): Promise<void> {
    const current = await this.getByProduct(productId, tx);
    if (current.stock_quantity < quantity) {
      throw insufficientStock(current, quantity);
    }
  }
}

const insufficientStock = (current: Inventory, requested: number): ValidationError =>
  new ValidationError(`Insufficient stock for product ${current.product_id}`, {
    product_id: current.product_id,
    available: current.stock_quantity,
    requested,
  });
