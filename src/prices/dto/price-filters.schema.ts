import { z } from 'zod';
import { PriceFilters } from '../interfaces/dashboard.interface';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD');

export const priceFiltersSchema = z
  .object({
    product: z.union([z.string(), z.array(z.string())]).optional(),
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine((query) => !query.from || !query.to || query.from <= query.to, {
    message: '"from" must not be after "to"',
    path: ['from'],
  })
  .transform(
    (query): PriceFilters => ({
      products: query.product === undefined || Array.isArray(query.product) ? query.product : [query.product],
      from: query.from,
      to: query.to,
    }),
  );
