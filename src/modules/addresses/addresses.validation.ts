import { z } from 'zod';
import type { CreateUserAddressInput, UpdateUserAddressInput } from '../../connections/db/models';
import { foreignKey, nonEmpty } from '../../utils/validation';

const addressFields = {
  line1: nonEmpty('Address line'),
  line2: z.string().trim().max(255).nullable().optional(),
  city: nonEmpty('City', 100),
  postal_code: nonEmpty('Postal code', 20),
  country: nonEmpty('Country', 100),
  is_default: z.boolean().optional(),
};

export const createAddressSchema: z.ZodType<CreateUserAddressInput> = z.object({
  user_id: foreignKey,
  ...addressFields,
});

export const updateAddressSchema: z.ZodType<UpdateUserAddressInput> = z.object(addressFields).partial();

// Request body: the owner comes from the token
export const addressBodySchema = z.object(addressFields);
