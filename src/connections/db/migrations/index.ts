import type { MigrationInfo } from './types';

import { migration as migration001 } from './20261019_000001_create_users_table';
import { migration as migration002 } from './20261019_000002_create_admins_table';
import { migration as migration003 } from './20261019_000003_create_user_addresses_table';
import { migration as migration004 } from './20261019_000004_create_categories_table';
import { migration as migration005 } from './20261019_000005_create_products_table';
import { migration as migration006 } from './20261019_000006_create_inventory_table';
import { migration as migration007 } from './20261019_000007_create_orders_table';
import { migration as migration008 } from './20261019_000008_create_order_items_table';
import { migration as migration009 } from './20261019_000009_create_payments_table';
import { migration as migration010 } from './20261019_000010_create_shipping_table';
import { migration as migration011 } from './20261019_000011_create_carts_table';
import { migration as migration012 } from './20261019_000012_create_reviews_table';
import { migration as migration013 } from './20261019_000013_create_coupons_table';
import { migration as migration014 } from './20261019_000014_create_wishlist_table';
import { migration as migration015 } from './20261019_000015_create_audit_logs_table';

// Applied in this order
export const migrations: MigrationInfo[] = [
  { name: '20261019_000001_create_users_table', migration: migration001 },
  { name: '20261019_000002_create_admins_table', migration: migration002 },
  { name: '20261019_000003_create_user_addresses_table', migration: migration003 },
  { name: '20261019_000004_create_categories_table', migration: migration004 },
  { name: '20261019_000005_create_products_table', migration: migration005 },
  { name: '20261019_000006_create_inventory_table', migration: migration006 },
  { name: '20261019_000007_create_orders_table', migration: migration007 },
  { name: '20261019_000008_create_order_items_table', migration: migration008 },
  { name: '20261019_000009_create_payments_table', migration: migration009 },
  { name: '20261019_000010_create_shipping_table', migration: migration010 },
  { name: '20261019_000011_create_carts_table', migration: migration011 },
  { name: '20261019_000012_create_reviews_table', migration: migration012 },
  { name: '20261019_000013_create_coupons_table', migration: migration013 },
  { name: '20261019_000014_create_wishlist_table', migration: migration014 },
  { name: '20261019_000015_create_audit_logs_table', migration: migration015 },
];
