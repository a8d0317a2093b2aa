import { z } from 'zod';

// Full-replacement payload: omitted optional fields fall back to their defaults.
export const itemInputSchema = z.object({
  name: z.string().min(1, 'name required'),
  description: z.string().nullable().default(null),
  price: z.number().finite().nonnegative('price must be >= 0'),
  is_available: z.boolean().default(true),
});

export const itemIdParamsSchema = z.object({
  // path params arrive as strings; only plain decimal digits name an item
  id: z
    .string()
    .regex(/^[1-9]\d*$/, 'id must be a positive integer')
    .transform((v) => Number(v))
    .refine((v) => Number.isSafeInteger(v), 'id out of range'),
});
