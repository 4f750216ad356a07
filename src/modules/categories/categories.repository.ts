import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  Category,
  CategoryFilter,
  CreateCategoryInput,
  UpdateCategoryInput,
} from '../../connections/db/models';
import { ValidationError } from '../../utils/errors';
import { createCategorySchema, updateCategorySchema } from './categories.validation';

export class CategoryRepository extends BaseRepository<
  Category,
  CreateCategoryInput,
  UpdateCategoryInput,
  CategoryFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'categories',
      entity: 'Category',
      createSchema: createCategorySchema,
      updateSchema: updateCategorySchema,
      filterColumns: ['name'],
    });
  }

  protected mapRow(row: QueryResultRow): Category {
    return {
      id: row.id,
      name: row.name,
      description: row.description ?? null,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateCategoryInput, db: Queryable): Promise<void> {
    await this.assertUnique(db, { name: input.name }, 'Category name already exists');
  }

  protected async beforeUpdate(existing: Category, input: UpdateCategoryInput, db: Queryable): Promise<void> {
    if (input.name && input.name !== existing.name) {
      await this.assertUnique(db, { name: input.name }, 'Category name already exists', existing.id);
    }
  }

  /**
   * Restrict: a category that still owns products cannot be deleted,
   * so no product is ever left pointing at a missing category.
   */
  protected async beforeDelete(existing: Category, db: Queryable): Promise<void> {
    const products = await db.query('SELECT id FROM products WHERE category_id = $1 LIMIT 1', [existing.id]);
    if (products.rows.length > 0) {
      throw new ValidationError('Category still has products; move or delete them first', {
        category_id: existing.id,
      });
    }
  }
}
