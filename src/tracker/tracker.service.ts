import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { PriceRepository } from '../database/price.repository';
import { TrackedProduct } from '../database/interfaces/database.interface';
import { TrackerRepository } from '../database/tracker.repository';
import { SiteKey } from '../scraper/interfaces/price.interface';

/**
 * Tracked URLs and settings, keeping prices.db in step with tracker.db
 */
@Injectable()
export class TrackerService {
  private readonly logger = new Logger(TrackerService.name);

  constructor(
    private readonly trackerRepository: TrackerRepository,
    private readonly priceRepository: PriceRepository,
  ) {}

  addProduct(url: string, source: SiteKey): TrackedProduct {
    const id = this.trackerRepository.addUrl(url.trim(), source);
    const product = this.trackerRepository.getUrl(id);
    if (!product) {
      throw new Error(`Tracked product ${url} could not be read back after insert`);
    }
    this.logger.log(`Tracking ${source} product ${product.url} (id ${product.id})`);
    return product;
  }

  listProducts(): TrackedProduct[] {
    return this.trackerRepository.getUrls();
  }

  /**
   * Stop tracking a product and drop its price history.
   * A failure in prices.db is logged; the tracker row stays deleted.
   */
  removeProduct(id: number): void {
    const url = this.trackerRepository.deleteUrl(id);
    if (url === null) {
      throw new NotFoundException(`Product with ID ${id} not found`);
    }

    try {
      const deletedHistory = this.priceRepository.deleteProductByUrl(url);
      if (deletedHistory === null) {
        this.logger.log(`Product with URL ${url} had no price data`);
      } else {
        this.logger.log(`Deleted ${url} and ${deletedHistory} price history entries`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error during cascade deletion from price database: ${message}`);
    }
  }

  emailAlertsEnabled(): boolean {
    return this.trackerRepository.getEmailAlerts();
  }

  setEmailAlerts(enabled: boolean): boolean {
    this.trackerRepository.setEmailAlerts(enabled);
    this.logger.log(`Email alerts ${enabled ? 'enabled' : 'disabled'}`);
    return this.trackerRepository.getEmailAlerts();
  }

  getTrackedUrls(): Set<string> {
    return this.trackerRepository.getTrackedUrls();
  }

  /**
   * Remove price data for products that are no longer tracked. Returns the
   * number of products removed; errors are logged and count as zero.
   */
  cleanupOrphanedData(): number {
    try {
      const removed = this.priceRepository.deleteProductsNotIn(this.trackerRepository.getTrackedUrls());
      if (removed > 0) {
        this.logger.log(`Cleaned up ${removed} orphaned products and their price history`);
      } else {
        this.logger.debug('No orphaned data found');
      }
      return removed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error during orphan cleanup: ${message}`);
      return 0;
    }
  }
}
