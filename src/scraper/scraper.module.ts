import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { PricesModule } from '../prices/prices.module';
import { TrackerModule } from '../tracker/tracker.module';
import { SITE_PARSERS, createSiteParsers } from './parsers/site-registry';
import { ScraperService, scrapeOnStartProvider } from './scraper.service';

@Module({
  imports: [ScheduleModule.forRoot(), TrackerModule, PricesModule],
  providers: [{ provide: SITE_PARSERS, useFactory: () => createSiteParsers() }, scrapeOnStartProvider, ScraperService],
  exports: [ScraperService],
})
export class ScraperModule {}
