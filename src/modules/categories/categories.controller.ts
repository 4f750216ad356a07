import type { CategoryRepository } from './categories.repository';
import type { ProductRepository } from '../products/products.repository';
import { categoryQuerySchema } from './categories.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { ResponseHandler } from '../../utils/response';
import { parseId } from '../../utils/validation';

export const createCategoriesController = (categories: CategoryRepository, products: ProductRepository) => ({
  ...createCrudHandlers(categories, categoryQuerySchema),

  getCategoryProducts: asyncHandler(async (req, res) => {
    const category = await categories.get(parseId(req.params.id, 'category id'));
    const list = await products.listByCategory(category.id);
    ResponseHandler.success(res, list);
  }),
});
