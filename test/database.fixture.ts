import { Provider } from '@nestjs/common';
import { PRICES_DB, TRACKER_DB } from '../src/database/database.constants';
import { PriceRepository } from '../src/database/price.repository';
import { openPricesDatabase, openTrackerDatabase } from '../src/database/sqlite';
import { TrackerRepository } from '../src/database/tracker.repository';

/**
 * Repositories over fresh in-memory SQLite databases
 */
export function inMemoryDatabaseProviders(): Provider[] {
  return [
    { provide: TRACKER_DB, useValue: openTrackerDatabase(':memory:') },
    { provide: PRICES_DB, useValue: openPricesDatabase(':memory:') },
    TrackerRepository,
    PriceRepository,
  ];
}
