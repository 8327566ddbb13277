import type { AxiosInstance } from 'axios';

export const SITE_KEYS = ['amazon', 'ebay', 'etsy'] as const;

export type SiteKey = (typeof SITE_KEYS)[number];

/**
 * One observation produced by a site scraper. `price` is a normalized
 * decimal string, or `'NA'` when extraction failed.
 */
export interface ScrapedProduct {
  date: string; // YYYY-MM-DD
  productName: string;
  price: string;
  availability: string;
  url: string;
}

export interface ScrapingOptions {
  requestTimeout: number;
  retryAttempts: number;
  retryDelay: number; // ms
  userAgent: string;
  snapshotDir?: string;
  httpClient?: AxiosInstance;
}

export interface ScrapingProgress {
  url: string;
  site: SiteKey | null;
  status: 'pending' | 'scraping' | 'completed' | 'error';
  error?: string;
}

export interface ScrapeRunSummary {
  startedAt: Date;
  finishedAt: Date;
  scraped: number;
  skipped: number;
  failed: number; // results that came back with an NA price
}
