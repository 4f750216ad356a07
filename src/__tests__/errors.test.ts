import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AppError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  getPgErrorCode,
} from '../utils/errors';
import { MAX_INT, foreignKey, listQuerySchema, money, parseId, parseWith, quantity } from '../utils/validation';

describe('errors', () => {
  it('should carry status and code', () => {
    const cases: Array<[AppError, number, string]> = [
      [new ValidationError(), 400, 'VALIDATION_ERROR'],
      [new NotFoundError(), 404, 'NOT_FOUND'],
      [new UnauthorizedError(), 401, 'UNAUTHORIZED'],
      [new ForbiddenError(), 403, 'FORBIDDEN'],
    ];

    for (const [error, statusCode, code] of cases) {
      expect(error).toBeInstanceOf(AppError);
      expect(error.statusCode).toBe(statusCode);
      expect(error.code).toBe(code);
    }
  });

  it('should name the entity and id in NotFoundError.entity', () => {
    const error = NotFoundError.entity('Order', 12);

    expect(error.message).toBe('Order 12 not found');
    expect(error.details).toEqual({ entity: 'Order', id: 12 });
    expect(error.name).toBe('NotFoundError');
  });

  it('should flatten zod issues', () => {
    const schema = z.object({ name: z.string(), price: z.number().positive('Price must be greater than 0') });
    const result = schema.safeParse({ name: 'Lamp', price: -1 });

    expect(result.success).toBe(false);
    if (!result.success) {
      const error = ValidationError.fromZod(result.error, 'Invalid product data');
      expect(error.message).toBe('Invalid product data');
      expect(error.details).toEqual([{ path: 'price', message: 'Price must be greater than 0' }]);
    }
  });

  it('should read the SQLSTATE from driver errors only', () => {
    expect(getPgErrorCode({ code: '23505' })).toBe('23505');
    expect(getPgErrorCode({ code: 42 })).toBeUndefined();
    expect(getPgErrorCode(new Error('boom'))).toBeUndefined();
    expect(getPgErrorCode(null)).toBeUndefined();
  });
});

describe('validation helpers', () => {
  it('should parse positive integer ids from route params', () => {
    expect(parseId('17')).toBe(17);
    expect(() => parseId('abc', 'order id')).toThrow('Invalid order id');
    expect(() => parseId('0')).toThrow(ValidationError);
  });

  it('should keep integers and amounts within their column types', () => {
    expect(parseId(String(MAX_INT))).toBe(2147483647);
    expect(() => parseId('2147483648')).toThrow('Invalid id');
    expect(foreignKey.safeParse(2147483648).success).toBe(false);
    expect(quantity('Quantity must be greater than 0').safeParse(2147483648).success).toBe(false);

    expect(money.parse(19.99)).toBe(19.99);
    expect(money.parse(99999999.99)).toBe(99999999.99);
    expect(money.safeParse(19.999).success).toBe(false);
    expect(money.safeParse(1e12).success).toBe(false);
  });

  it('should coerce and bound list query parameters', () => {
    expect(parseWith(listQuerySchema, { limit: '10', offset: '20' })).toEqual({ limit: 10, offset: 20 });
    expect(() => parseWith(listQuerySchema, { limit: '500' })).toThrow(ValidationError);
  });
});
