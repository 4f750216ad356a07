import type { CouponRepository } from './coupons.repository';
import { couponQuerySchema } from './coupons.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { NotFoundError } from '../../utils/errors';
import { ResponseHandler } from '../../utils/response';

export const createCouponsController = (coupons: CouponRepository) => ({
  ...createCrudHandlers(coupons, couponQuerySchema),

  getCouponByCode: asyncHandler(async (req, res) => {
    const coupon = await coupons.findByCode(req.params.code);
    if (!coupon) {
      throw NotFoundError.entity('Coupon', req.params.code);
    }
    ResponseHandler.success(res, coupon);
  }),
});
