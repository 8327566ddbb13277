import { Global, Module } from '@nestjs/common';
import { appConfig } from '../config/app.config';
import { PRICES_DB, TRACKER_DB } from './database.constants';
import { PriceRepository } from './price.repository';
import { openPricesDatabase, openTrackerDatabase } from './sqlite';
import { TrackerRepository } from './tracker.repository';

@Global()
@Module({
  providers: [
    {
      provide: TRACKER_DB,
      useFactory: () => openTrackerDatabase(appConfig.database.trackerPath),
    },
    {
      provide: PRICES_DB,
      useFactory: () => openPricesDatabase(appConfig.database.pricesPath),
    },
    TrackerRepository,
    PriceRepository,
  ],
  exports: [TrackerRepository, PriceRepository],
})
export class DatabaseModule {}
