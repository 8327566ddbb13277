import { INestApplicationContext, Logger } from '@nestjs/common';
import { ScrapeRunSummary } from './scraper/interfaces/price.interface';
import { ScraperService } from './scraper/scraper.service';

const logger = new Logger('ScrapeOnce');

/**
 * Scrape every tracked product once, then close the context
 */
export async function scrapeOnce(app: INestApplicationContext): Promise<ScrapeRunSummary> {
  try {
    const summary = await app.get(ScraperService).scrapeAll();
    logger.log(`Run finished: ${summary.scraped} scraped, ${summary.failed} without price, ${summary.skipped} skipped`);
    return summary;
  } finally {
    await app.close();
  }
}
