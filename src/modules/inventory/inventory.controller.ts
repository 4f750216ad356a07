import type { InventoryRepository } from './inventory.repository';
import { adjustInventorySchema, inventoryQuerySchema } from './inventory.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

export const createInventoryController = (inventory: InventoryRepository) => ({
  ...createCrudHandlers(inventory, inventoryQuerySchema),

  // Restock (positive delta) or write off (negative delta)
  adjustStock: asyncHandler(async (req, res) => {
    const record = await inventory.get(parseId(req.params.id, 'inventory id'));
    const { delta } = parseWith(adjustInventorySchema, req.body, 'Invalid stock adjustment');
    const updated = await inventory.adjust(record.product_id, delta);
    res.locals.entityId = updated.id;
    ResponseHandler.success(res, updated, 'Stock adjusted');
  }),
});
