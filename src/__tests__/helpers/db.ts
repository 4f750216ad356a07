import { newDb } from 'pg-mem';
import type { Pool } from 'pg';
import { runMigrations } from '../../connections/db/migrate';
import { createContext } from '../../context';
import type { AppContext } from '../../context';
import type { Category, Product, User } from '../../connections/db/models';

/**
 * An empty in-memory PostgreSQL behind the `pg` Pool API.
 * The AST coverage check is off so column type modifiers such as DECIMAL(10, 2) are accepted.
 */
export const createMemoryPool = (): Pool => {
  const { Pool: MemoryPool } = newDb({ noAstCoverageCheck: true }).adapters.createPg();
  return new MemoryPool();
};

/**
 * A fresh in-memory PostgreSQL with every migration applied.
 */
export const createTestContext = async (): Promise<AppContext> => {
  const pool = createMemoryPool();
  await runMigrations(pool);
  return createContext(pool);
};

let sequence = 0;

export const createUser = async (context: AppContext, overrides: { email?: string; role?: 'customer' | 'seller' } = {}): Promise<User> => {
  sequence += 1;
  return context.repositories.users.create({
    email: overrides.email ?? `user${sequence}@example.com`,
    password: 'test-password',
    full_name: `Test User ${sequence}`,
    role: overrides.role,
  });
};

export const createCategory = async (context: AppContext, name: string = 'Books'): Promise<Category> =>
  context.repositories.categories.create({ name });

/** A product in `category` with an inventory record holding `stock` units. */
export const createStockedProduct = async (
  context: AppContext,
  category: Category,
  { name, price, stock }: { name: string; price: number; stock: number }
): Promise<Product> => {
  const product = await context.repositories.products.create({ category_id: category.id, name, price });
  await context.repositories.inventory.create({ product_id: product.id, stock_quantity: stock });
  return product;
};
