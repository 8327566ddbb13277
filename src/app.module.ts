import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { DatabaseModule } from './database/database.module';
import { NotificationsModule } from './notifications/notifications.module';
import { PricesModule } from './prices/prices.module';
import { ScraperModule } from './scraper/scraper.module';
import { TrackerModule } from './tracker/tracker.module';

@Module({
  imports: [DatabaseModule, NotificationsModule, TrackerModule, PricesModule, ScraperModule],
  controllers: [AppController],
})
export class AppModule {}
