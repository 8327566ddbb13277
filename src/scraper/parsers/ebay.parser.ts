import { scraperConfig } from '../config/scraper.config';
import { ScrapingOptions } from '../interfaces/price.interface';
import { BaseParser, SiteRules } from './base.parser';

export class EbayParser extends BaseParser {
  protected readonly rules: SiteRules = {
    titleSelectors: ['h1', 'h1[data-testid="x-item-title"]', 'h1.x-item-title__mainTitle', '.x-item-title__mainTitle'],
    priceSelectors: [
      '[data-testid="x-price-primary"] .ux-textspans',
      '.x-price-primary .ux-textspans',
      'span.ux-textspans',
      'span#prcIsum',
      'span#mm-saleDscPrc',
      'span[itemprop="price"]',
      'span.s-item__price',
      'div.x-price-approx__price',
      'div.x-price-approx__value',
      'span.display-price',
      'span[itemprop="lowPrice"]',
      'span[itemprop="highPrice"]',
      'span[itemprop="offers"]',
      'div[itemprop="offers"] span',
      '.x-price-primary span',
      '.x-price-approx__price .ux-textspans',
      '.x-price-approx__value .ux-textspans',
      '[data-testid="x-price-primary"] span',
    ],
    fallbackQuery: '[class*="price"], [id*="price"], [class*="Price"], [id*="Price"]',
    fallbackPattern: /\$|€|EUR|£/,
    availabilitySelectors: [
      'span#qtySubTxt',
      '.x-item-condition__availability',
      '[data-testid="availability"]',
      '.s-item__availability',
    ],
    outOfStockPhrases: ['out of stock', 'unavailable', 'sold out', 'no longer available'],
    botProtectionPhrases: [
      'ihr browser wird geprüft',
      'your browser is being checked',
      'bot detection',
      'please wait',
      'checking your browser',
      'cloudflare',
      'verifying you are human',
      'captcha',
    ],
  };

  constructor(options: Partial<ScrapingOptions> = {}) {
    super('ebay', scraperConfig.sites.ebay.name, options);
  }
}
