export const ORDER_STATUSES = ['pending', 'paid', 'shipped', 'delivered', 'cancelled'] as const;

export const PAYMENT_METHODS = ['card', 'cash_on_delivery', 'bank_transfer', 'wallet'] as const;

export const PAYMENT_STATUSES = ['pending', 'completed', 'failed', 'refunded'] as const;

export const SHIPPING_STATUSES = ['pending', 'shipped', 'in_transit', 'delivered', 'returned'] as const;
