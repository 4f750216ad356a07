// 1:1 with products
export interface Inventory {
  id: number;
  product_id: number;
  stock_quantity: number;
  created_at: Date;
  updated_at: Date;
}

export interface CreateInventoryInput {
  product_id: number;
  stock_quantity?: number; // default: 0
}

export interface UpdateInventoryInput {
  stock_quantity?: number;
}

export interface InventoryFilter {
  product_id: number;
}
