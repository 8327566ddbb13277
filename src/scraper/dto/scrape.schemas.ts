import { z } from 'zod';

export const previewScrapeSchema = z.object({
  url: z.string().trim().url().max(2048),
  source: z.string().trim().min(1),
});

export type PreviewScrapeDto = z.infer<typeof previewScrapeSchema>;
