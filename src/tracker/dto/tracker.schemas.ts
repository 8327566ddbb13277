import { z } from 'zod';
import { SITE_KEYS } from '../../scraper/interfaces/price.interface';

export const addProductSchema = z.object({
  url: z.string().trim().url().max(2048),
  source: z.enum(SITE_KEYS),
});

export type AddProductDto = z.infer<typeof addProductSchema>;

export const emailAlertsSchema = z.object({
  enabled: z.boolean(),
});

export type EmailAlertsDto = z.infer<typeof emailAlertsSchema>;
