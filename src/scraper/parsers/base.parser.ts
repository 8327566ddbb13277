import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { scraperConfig } from '../config/scraper.config';
import { ScrapedProduct, ScrapingOptions, SiteKey } from '../interfaces/price.interface';
import {
  NA_PRICE,
  UNKNOWN_AVAILABILITY,
  cleanTitle,
  extractPrice,
  formatDate,
  formatTimestamp,
} from '../utils/text.util';

type CheerioAPI = ReturnType<typeof cheerio.load>;

export const UNKNOWN_PRODUCT = 'Unknown Product';
export const IN_STOCK = 'In Stock';
export const OUT_OF_STOCK = 'Out of Stock';

/** Product names recorded in place of a real title when a scrape fails */
export const FAILURE_NAMES = {
  botProtection: 'Bot Protection Detected',
  timeout: 'Timeout',
  error: 'Error',
  unsupported: 'Unsupported site',
} as const;

const FAILURE_NAME_SET = new Set<string>(Object.values(FAILURE_NAMES));

export function isFailureName(productName: string): boolean {
  return FAILURE_NAME_SET.has(productName);
}

export interface SiteRules {
  titleSelectors: string[];
  /** Ordered by reliability; the first selector yielding a price wins */
  priceSelectors: string[];
  /** Broad query scanned when no price selector matched */
  fallbackQuery: string;
  /** Fallback elements are only considered when their text matches this */
  fallbackPattern: RegExp;
  availabilitySelectors: string[];
  outOfStockPhrases: string[];
  /** When set, a match stops the availability scan with In Stock */
  inStockPhrases?: string[];
  botProtectionPhrases: string[];
}

export class ScrapeTimeoutError extends Error {
  constructor(url: string, attempts: number) {
    super(`Timed out fetching ${url} after ${attempts} attempts`);
    this.name = 'ScrapeTimeoutError';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isTimeoutError(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export abstract class BaseParser {
  protected readonly logger: Logger;
  protected readonly axiosInstance: AxiosInstance;
  protected readonly options: ScrapingOptions;
  protected abstract readonly rules: SiteRules;

  constructor(
    protected readonly site: SiteKey,
    protected readonly siteName: string,
    options: Partial<ScrapingOptions> = {},
  ) {
    this.logger = new Logger(`${siteName}Parser`);
    this.options = { ...scraperConfig.scraping, ...options };
    this.axiosInstance =
      this.options.httpClient ??
      axios.create({
        timeout: this.options.requestTimeout,
        responseType: 'text',
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });
  }

  /**
   * Fetch HTML for a product page, retrying on failure.
   * An error response that is a bot wall is returned as-is so `parse` can report it.
   * A timeout on the last attempt is reported as ScrapeTimeoutError.
   */
  protected async fetchHtml(url: string): Promise<string> {
    let lastError: unknown = null;
    const totalAttempts = this.options.retryAttempts + 1;

    for (let attempt = 0; attempt < totalAttempts; attempt++) {
      try {
        const response = await this.axiosInstance.get<string>(url);
        return String(response.data);
      } catch (error) {
        if (axios.isAxiosError(error) && error.response) {
          const body = String(error.response.data ?? '');
          if (this.isBotWall(body)) {
            this.logger.debug(`${url} answered ${error.response.status} with a bot wall`);
            return body;
          }
        }
        lastError = error;
        this.logger.debug(`Attempt ${attempt + 1}/${totalAttempts} for ${url} failed: ${describeError(error)}`);
        if (attempt < this.options.retryAttempts) {
          await this.delay(this.options.retryDelay);
        }
      }
    }

    if (isTimeoutError(lastError)) {
      throw new ScrapeTimeoutError(url, totalAttempts);
    }
    throw new Error(`Failed to fetch ${url} after ${totalAttempts} attempts: ${describeError(lastError)}`);
  }

  /**
   * Extract title, price and availability from a product page
   */
  parse(html: string, url: string, date: string = formatDate(new Date())): ScrapedProduct {
    if (this.isBotWall(html)) {
      this.logger.warn(`Bot protection detected on ${this.siteName} page: ${url}`);
      return this.failure(url, FAILURE_NAMES.botProtection, date);
    }

    const $ = cheerio.load(html);
    const productName = this.extractTitle($);
    const price = this.findSelectorPrice($) ?? this.findFallbackPrice($) ?? NA_PRICE;

    if (price === NA_PRICE) {
      this.logger.warn(`Price not found for ${url} (product: ${productName})`);
    } else {
      this.logger.log(`Price extracted: ${price} for ${productName}`);
    }

    return {
      date,
      productName,
      price,
      availability: this.extractAvailability($),
      url,
    };
  }

  protected isBotWall(html: string): boolean {
    const lowered = html.toLowerCase();
    return this.rules.botProtectionPhrases.some((phrase) => lowered.includes(phrase));
  }

  protected extractTitle($: CheerioAPI): string {
    for (const selector of this.rules.titleSelectors) {
      const title = cleanTitle(this.textOf($, selector));
      if (title) {
        this.logger.debug(`Title found using selector: ${selector}`);
        return title;
      }
    }
    return UNKNOWN_PRODUCT;
  }

  protected findSelectorPrice($: CheerioAPI): string | null {
    for (const selector of this.rules.priceSelectors) {
      const text = this.textOf($, selector);
      if (!text.trim()) {
        this.logger.debug(`Selector ${selector} returned no element`);
        continue;
      }
      const price = extractPrice(text);
      if (price !== NA_PRICE) {
        this.logger.debug(`Price found using selector: ${selector}`);
        return price;
      }
      this.logger.debug(`Selector ${selector} matched '${text.trim()}' but no price could be extracted`);
    }
    return null;
  }

  protected findFallbackPrice($: CheerioAPI): string | null {
    const candidates = $(this.rules.fallbackQuery).toArray();
    this.logger.debug(`Trying fallback price detection over ${candidates.length} elements`);

    for (const [index, element] of candidates.entries()) {
      const text = $(element).text();
      if (!this.rules.fallbackPattern.test(text)) continue;
      const price = extractPrice(text);
      if (price !== NA_PRICE) {
        this.logger.debug(`Price found using fallback element ${index}: '${text.trim()}'`);
        return price;
      }
    }
    return null;
  }

  protected extractAvailability($: CheerioAPI): string {
    for (const selector of this.rules.availabilitySelectors) {
      const text = this.textOf($, selector).toLowerCase();
      if (!text) continue;
      if (this.rules.outOfStockPhrases.some((phrase) => text.includes(phrase))) {
        return OUT_OF_STOCK;
      }
      if (this.rules.inStockPhrases?.some((phrase) => text.includes(phrase))) {
        return IN_STOCK;
      }
    }
    return IN_STOCK;
  }

  /**
   * Text of the first element matching `selector`; '' when nothing matches
   * or the selector is not understood by the parser.
   */
  private textOf($: CheerioAPI, selector: string): string {
    try {
      return $(selector).first().text();
    } catch (error) {
      this.logger.debug(`Error with selector '${selector}': ${describeError(error)}`);
      return '';
    }
  }

  protected failure(url: string, productName: string, date: string = formatDate(new Date())): ScrapedProduct {
    return {
      date,
      productName,
      price: NA_PRICE,
      availability: UNKNOWN_AVAILABILITY,
      url,
    };
  }

  /**
   * Keep the raw page around when extraction failed, if a snapshot directory is configured
   */
  protected async saveSnapshot(html: string): Promise<string | null> {
    const { snapshotDir } = this.options;
    if (!snapshotDir) return null;

    const path = join(snapshotDir, `${this.site}_${formatTimestamp(new Date())}.html`);
    try {
      await mkdir(snapshotDir, { recursive: true });
      await writeFile(path, html, 'utf8');
      this.logger.log(`Snapshot saved: ${path}`);
      return path;
    } catch (error) {
      this.logger.warn(`Could not save snapshot ${path}: ${describeError(error)}`);
      return null;
    }
  }

  protected delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getSiteName(): string {
    return this.siteName;
  }

  /**
   * Fetch and parse a product page. Never throws: failures come back as an
   * NA record named after what went wrong.
   */
  async scrape(url: string): Promise<ScrapedProduct> {
    const date = formatDate(new Date());
    this.logger.log(`Starting ${this.siteName} scrape for: ${url}`);

    try {
      const html = await this.fetchHtml(url);
      const result = this.parse(html, url, date);
      if (result.price === NA_PRICE && result.productName !== FAILURE_NAMES.botProtection) {
        await this.saveSnapshot(html);
      }
      return result;
    } catch (error) {
      if (error instanceof ScrapeTimeoutError) {
        this.logger.warn(`Timeout scraping ${url}: ${error.message}`);
        return this.failure(url, FAILURE_NAMES.timeout, date);
      }
      this.logger.error(`Error scraping ${url}: ${describeError(error)}`);
      return this.failure(url, FAILURE_NAMES.error, date);
    }
  }
}
