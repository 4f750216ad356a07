import type { Pool } from 'pg';
import { AdminRepository } from './modules/admins/admins.repository';
import { UserAddressRepository } from './modules/addresses/addresses.repository';
import { AuditLogRepository } from './modules/audit-logs/audit-logs.repository';
import { AuthService } from './modules/auth/auth.service';
import { CartItemRepository } from './modules/cart/cart-items.repository';
import { CartRepository } from './modules/cart/cart.repository';
import { CartService } from './modules/cart/cart.service';
import { CategoryRepository } from './modules/categories/categories.repository';
import { CouponRepository } from './modules/coupons/coupons.repository';
import { InventoryRepository } from './modules/inventory/inventory.repository';
import { CheckoutService } from './modules/orders/checkout.service';
import { OrderItemRepository } from './modules/orders/order-items.repository';
import { OrderRepository } from './modules/orders/orders.repository';
import { PaymentRepository } from './modules/payment/payments.repository';
import { ProductRepository } from './modules/products/products.repository';
import { ReviewRepository } from './modules/reviews/reviews.repository';
import { ShippingRepository } from './modules/shipping/shipping.repository';
import { UserRepository } from './modules/users/users.repository';
import { WishlistRepository } from './modules/wishlist/wishlist.repository';

export interface Repositories {
  users: UserRepository;
  admins: AdminRepository;
  addresses: UserAddressRepository;
  categories: CategoryRepository;
  products: ProductRepository;
  inventory: InventoryRepository;
  orders: OrderRepository;
  orderItems: OrderItemRepository;
  payments: PaymentRepository;
  shipping: ShippingRepository;
  carts: CartRepository;
  cartItems: CartItemRepository;
  reviews: ReviewRepository;
  coupons: CouponRepository;
  wishlist: WishlistRepository;
  auditLogs: AuditLogRepository;
}

export interface Services {
  auth: AuthService;
  cart: CartService;
  checkout: CheckoutService;
}

/**
 * Everything a request handler needs, built once per process
 * (or once per test against an in-memory database).
 */
export interface AppContext {
  db: Pool;
  repositories: Repositories;
  services: Services;
}

export const createRepositories = (db: Pool): Repositories => ({
  users: new UserRepository(db),
  admins: new AdminRepository(db),
  addresses: new UserAddressRepository(db),
  categories: new CategoryRepository(db),
  products: new ProductRepository(db),
  inventory: new InventoryRepository(db),
  orders: new OrderRepository(db),
  orderItems: new OrderItemRepository(db),
  payments: new PaymentRepository(db),
  shipping: new ShippingRepository(db),
  carts: new CartRepository(db),
  cartItems: new CartItemRepository(db),
  reviews: new ReviewRepository(db),
  coupons: new CouponRepository(db),
  wishlist: new WishlistRepository(db),
  auditLogs: new AuditLogRepository(db),
});

export const createContext = (db: Pool): AppContext => {
  const repositories = createRepositories(db);

  return {
    db,
    repositories,
    services: {
      auth: new AuthService(repositories.users, repositories.admins),
      cart: new CartService(repositories.carts, repositories.cartItems, repositories.products, repositories.inventory),
      checkout: new CheckoutService(db, repositories),
    },
  };
};
