import { scraperConfig } from '../config/scraper.config';
import { ScrapingOptions } from '../interfaces/price.interface';
import { BaseParser, SiteRules } from './base.parser';

export class EtsyParser extends BaseParser {
  protected readonly rules: SiteRules = {
    titleSelectors: [
      'h1[data-buy-box-listing-title]',
      'h1[data-listing-id]',
      'h1.listing-page-title',
      'h1[data-testid="listing-page-title"]',
      'h1',
    ],
    priceSelectors: [
      'p[data-buy-box-region="price"] span[data-buy-box-region="price"]',
      'span[data-buy-box-region="price"]',
      'p[data-buy-box-region="price"]',

      'span.currency-value',
      'div[data-buy-box-region="price"] span',
      'div[data-component="buybox"] span[data-buy-box-region="price"]',
      'span[data-buy-box-region="discounted-price"]',
      'span[data-buy-box-region="regular-price"]',

      '[data-testid="price"]',
      '.price',
      '.listing-price',
      '.buy-box-price',
      'span[class*="price"]',
      'div[class*="price"]',

      'span[class*="currency"]',
      'div[class*="currency"]',
    ],
    fallbackQuery:
      '[class*="price"], [id*="price"], [class*="Price"], [id*="Price"], [class*="currency"], [id*="currency"]',
    fallbackPattern: /\$|€|EUR|£|\d+/,
    availabilitySelectors: [
      'div[data-buy-box-region="sold-out-message"]',
      '.sold-out-message',
      '.unavailable-message',
      '[data-testid="sold-out"]',
      '.listing-unavailable',
    ],
    outOfStockPhrases: ['sold out', 'unavailable', 'out of stock', 'no longer available', 'discontinued'],
    botProtectionPhrases: [
      'checking your browser',
      'cloudflare',
      'bot protection',
      'please wait',
      'verifying you are human',
    ],
  };

  constructor(options: Partial<ScrapingOptions> = {}) {
    super('etsy', scraperConfig.sites.etsy.name, options);
  }
}
