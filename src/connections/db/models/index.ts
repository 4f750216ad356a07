export type * from './user.model';
export type * from './admin.model';
export type * from './user-address.model';
export type * from './category.model';
export type * from './product.model';
export type * from './inventory.model';
export type * from './order.model';
export type * from './order-item.model';
export type * from './payment.model';
export type * from './shipping.model';
export type * from './cart.model';
export type * from './cart-item.model';
export type * from './review.model';
export type * from './coupon.model';
export type * from './wishlist.model';
export type * from './audit-log.model';
