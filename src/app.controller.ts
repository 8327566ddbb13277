import { Body, Controller, Get, HttpCode, Logger, Post } from '@nestjs/common';
import { ZodValidationPipe } from './common/pipes/zod-validation.pipe';
import { PreviewScrapeDto, previewScrapeSchema } from './scraper/dto/scrape.schemas';
import { ScrapeRunSummary, ScrapedProduct, ScrapingProgress } from './scraper/interfaces/price.interface';
import { ScraperService } from './scraper/scraper.service';

export interface ScrapeStatus {
  isScraping: boolean;
  progress: ScrapingProgress[];
  lastRun: ScrapeRunSummary | null;
}

@Controller('api')
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(private readonly scraperService: ScraperService) {}

  @Get('health')
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  @Post('scrape')
  @HttpCode(202)
  triggerScrape(): ScrapeStatus {
    // Runs in the background; poll /api/scrape/progress
    this.scraperService.scrapeAll().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scraping error: ${message}`);
    });
    return this.getScrapeStatus();
  }

  @Get('scrape/progress')
  getScrapeStatus(): ScrapeStatus {
    return {
      isScraping: this.scraperService.getIsScraping(),
      progress: this.scraperService.getScrapingProgress(),
      lastRun: this.scraperService.getLastRun(),
    };
  }

  @Post('scrape/preview')
  @HttpCode(200)
  previewScrape(@Body(new ZodValidationPipe(previewScrapeSchema)) body: PreviewScrapeDto): Promise<ScrapedProduct> {
    return this.scraperService.scrapeProduct(body.source, body.url);
  }
}
