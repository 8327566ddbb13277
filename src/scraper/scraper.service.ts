import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { PriceRecorderService } from '../prices/price-recorder.service';
import { TrackerService } from '../tracker/tracker.service';
import { scraperConfig } from './config/scraper.config';
import { ScrapeRunSummary, ScrapedProduct, ScrapingProgress } from './interfaces/price.interface';
import { FAILURE_NAMES, isFailureName } from './parsers/base.parser';
import { SITE_PARSERS, SiteParsers, detectSite } from './parsers/site-registry';
import { NA_PRICE, UNKNOWN_AVAILABILITY, formatDate } from './utils/text.util';

export const SCRAPE_ON_START = Symbol('SCRAPE_ON_START');

@Injectable()
export class ScraperService implements OnModuleInit {
  private readonly logger = new Logger(ScraperService.name);
  private currentRun: Promise<ScrapeRunSummary> | null = null;
  private lastRun: ScrapeRunSummary | null = null;
  private scrapingProgress: Map<string, ScrapingProgress> = new Map();

  constructor(
    @Inject(SITE_PARSERS) private readonly parsers: SiteParsers,
    @Inject(SCRAPE_ON_START) private readonly scrapeOnStart: boolean,
    private readonly trackerService: TrackerService,
    private readonly priceRecorder: PriceRecorderService,
  ) {}

  /**
   * Scrape a single URL without saving anything.
   * Unknown sources yield the 'Unsupported site' record.
   */
  async scrapeProduct(source: string, url: string): Promise<ScrapedProduct> {
    const site = detectSite(source);
    if (!site) {
      this.logger.warn(`Unsupported site for URL: ${url}`);
      return {
        date: formatDate(new Date()),
        productName: FAILURE_NAMES.unsupported,
        price: NA_PRICE,
        availability: UNKNOWN_AVAILABILITY,
        url,
      };
    }
    return this.parsers[site].scrape(url);
  }

  /**
   * Scrape every tracked URL and record the results.
   * A call made while a run is in progress joins that run.
   */
  scrapeAll(): Promise<ScrapeRunSummary> {
    if (this.currentRun) {
      this.logger.warn('Scraping already in progress, joining the current run');
      return this.currentRun;
    }

    this.currentRun = this.runScrape().finally(() => {
      this.currentRun = null;
    });
    return this.currentRun;
  }

  private async runScrape(): Promise<ScrapeRunSummary> {
    const startedAt = new Date();
    this.logger.log('Starting scraping of all tracked products...');

    this.trackerService.cleanupOrphanedData();

    const products = this.trackerService.listProducts();
    this.scrapingProgress.clear();
    if (products.length === 0) {
      this.logger.log('No URLs found in database.');
      return this.finishRun({ startedAt, finishedAt: new Date(), scraped: 0, skipped: 0, failed: 0 });
    }

    products.forEach((product) => {
      this.scrapingProgress.set(product.url, {
        url: product.url,
        site: detectSite(product.source),
        status: 'pending',
      });
    });

    const results: ScrapedProduct[] = [];
    let skipped = 0;

    // One page at a time
    for (const product of products) {
      const site = detectSite(product.source);
      if (!site) {
        this.logger.warn(`Unknown source '${product.source}' for URL: ${product.url}`);
        this.scrapingProgress.set(product.url, {
          url: product.url,
          site: null,
          status: 'error',
          error: FAILURE_NAMES.unsupported,
        });
        skipped++;
        continue;
      }

      this.logger.log(`Scraping: ${product.url}`);
      this.scrapingProgress.set(product.url, { url: product.url, site, status: 'scraping' });

      const result = await this.parsers[site].scrape(product.url);
      results.push(result);

      this.scrapingProgress.set(
        product.url,
        result.price === NA_PRICE
          ? {
              url: product.url,
              site,
              status: 'error',
              error: isFailureName(result.productName) ? result.productName : 'Price not found',
            }
          : { url: product.url, site, status: 'completed' },
      );
    }

    await this.priceRecorder.saveResults(results);

    const failed = results.filter((result) => result.price === NA_PRICE).length;
    this.logger.log(
      `Scraping complete: ${results.length} scraped, ${failed} without price, ${skipped} skipped. Data saved to SQLite database.`,
    );
    return this.finishRun({ startedAt, finishedAt: new Date(), scraped: results.length, skipped, failed });
  }

  private finishRun(summary: ScrapeRunSummary): ScrapeRunSummary {
    this.lastRun = summary;
    return summary;
  }

  getScrapingProgress(): ScrapingProgress[] {
    return Array.from(this.scrapingProgress.values());
  }

  getIsScraping(): boolean {
    return this.currentRun !== null;
  }

  getLastRun(): ScrapeRunSummary | null {
    return this.lastRun;
  }

  /**
   * Daily scrape at 10:00 server time
   */
  @Cron(CronExpression.EVERY_DAY_AT_10AM, { name: 'daily-scrape' })
  async handleScheduledScraping(): Promise<void> {
    this.logger.log('Running scheduled scraping...');
    try {
      await this.scrapeAll();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scheduled scrape failed: ${message}`);
    }
  }

  /**
   * Optional initial scrape; runs in the background so startup is not blocked
   */
  onModuleInit(): void {
    if (!this.scrapeOnStart) return;

    this.logger.log('Performing initial scrape in background...');
    this.scrapeAll().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Initial scrape failed: ${message}`);
    });
  }
}

export const scrapeOnStartProvider = {
  provide: SCRAPE_ON_START,
  useValue: scraperConfig.scraping.scrapeOnStart,
};
