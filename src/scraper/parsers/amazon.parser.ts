import { scraperConfig } from '../config/scraper.config';
import { ScrapingOptions } from '../interfaces/price.interface';
import { BaseParser, SiteRules } from './base.parser';

export class AmazonParser extends BaseParser {
  protected readonly rules: SiteRules = {
    titleSelectors: ['#productTitle', 'h1[data-automation-id="product-title"]', 'h1.product-title', 'h1'],
    priceSelectors: [
      // Buy box
      '#corePriceDisplay_desktop_feature_div span.a-offscreen',
      '#priceblock_ourprice',
      '#priceblock_dealprice',
      '#priceblock_saleprice',

      'span.a-price span.a-offscreen',
      'span.a-price-whole',
      '.a-price .a-offscreen',
      '.a-price-range .a-offscreen',

      // Deals
      '.a-price.a-text-price .a-offscreen',
      '.a-price.a-text-price.a-size-base.a-color-secondary .a-offscreen',

      // Kindle and digital
      '#kindle-price',
      '#digital-list-price',

      // Used / new offers
      '.a-price.a-text-price.a-size-base.a-color-secondary',
      '.a-price.a-text-price.a-size-base.a-color-price',

      'span.a-color-price',
      '.a-price',
      '[data-a-color="price"]',
      '.a-price-range',
    ],
    fallbackQuery: '[class*="price"], [id*="price"], [data-a-color="price"]',
    fallbackPattern: /\$[\d,]+\.?\d*/,
    availabilitySelectors: [
      '#availability span',
      '#availability',
      '.a-color-state',
      '[data-csa-c-type="availability"]',
      '.a-color-success',
      '.a-color-error',
    ],
    outOfStockPhrases: [
      'out of stock',
      'unavailable',
      'currently unavailable',
      'temporarily out of stock',
      "we don't know when",
      'no longer available',
      'discontinued',
    ],
    inStockPhrases: ['in stock', 'available', 'ready to ship'],
    botProtectionPhrases: [
      'checking your browser',
      'cloudflare',
      'bot protection',
      'please wait',
      'verifying you are human',
      'captcha',
    ],
  };

  constructor(options: Partial<ScrapingOptions> = {}) {
    super('amazon', scraperConfig.sites.amazon.name, options);
  }
}
