import { SITE_KEYS, ScrapingOptions, SiteKey } from '../interfaces/price.interface';
import { AmazonParser } from './amazon.parser';
import { BaseParser } from './base.parser';
import { EbayParser } from './ebay.parser';
import { EtsyParser } from './etsy.parser';

export type SiteParsers = Record<SiteKey, BaseParser>;

/** Injection token for the source -> parser map */
export const SITE_PARSERS = Symbol('SITE_PARSERS');

export function isSiteKey(source: string): source is SiteKey {
  return SITE_KEYS.some((key) => key === source);
}

/**
 * Map a tracked product's `source` onto a supported site
 */
export function detectSite(source: string): SiteKey | null {
  const normalized = source.trim().toLowerCase();
  return isSiteKey(normalized) ? normalized : null;
}

export function createSiteParsers(options: Partial<ScrapingOptions> = {}): SiteParsers {
  return {
    amazon: new AmazonParser(options),
    ebay: new EbayParser(options),
    etsy: new EtsyParser(options),
  };
}
