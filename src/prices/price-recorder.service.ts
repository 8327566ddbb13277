import { Injectable, Logger } from '@nestjs/common';
import { PriceRepository } from '../database/price.repository';
import { EmailService } from '../notifications/email.service';
import { isFailureName } from '../scraper/parsers/base.parser';
import { ScrapedProduct } from '../scraper/interfaces/price.interface';
import { cleanAvailability, cleanTitle, toPriceValue } from '../scraper/utils/text.util';
import { TrackerService } from '../tracker/tracker.service';

export interface SaveSummary {
  inserted: number;
  duplicates: number;
  alertsSent: number;
}

/**
 * Persists scrape results as daily observations and fires price-drop alerts
 */
@Injectable()
export class PriceRecorderService {
  private readonly logger = new Logger(PriceRecorderService.name);

  constructor(
    private readonly priceRepository: PriceRepository,
    private readonly trackerService: TrackerService,
    private readonly emailService: EmailService,
  ) {}

  async saveResults(results: ScrapedProduct[]): Promise<SaveSummary> {
    const summary: SaveSummary = { inserted: 0, duplicates: 0, alertsSent: 0 };
    const alerted = new Set<string>();
    const emailEnabled = this.trackerService.emailAlertsEnabled();

    for (const result of results) {
      const productName = cleanTitle(result.productName);
      const availability = cleanAvailability(result.availability);
      const price = toPriceValue(result.price);

      // Failure names keep whatever name is already stored
      const productId = this.priceRepository.upsertProduct(productName, result.url, isFailureName(productName));
      const previous = this.priceRepository.findPreviousObservation(productId, result.date);

      if (this.priceRepository.hasObservation(productId, result.date)) {
        this.logger.log(`Skipped duplicate entry for product_id=${productId} on ${result.date}`);
        summary.duplicates++;
      } else {
        this.priceRepository.insertObservation({ productId, date: result.date, price, availability });
        summary.inserted++;
      }

      if (!emailEnabled || !previous || previous.price === null || price === null || price >= previous.price) {
        continue;
      }

      const alertKey = `${productId}:${previous.price}:${price}`;
      if (alerted.has(alertKey)) continue;

      const outcome = await this.emailService.sendPriceDropAlert({
        productName,
        oldPrice: previous.price,
        newPrice: price,
        url: result.url,
      });
      if (outcome.success) {
        alerted.add(alertKey);
        summary.alertsSent++;
      } else if (!outcome.skipped) {
        this.logger.error(`Error sending price drop alert for ${productName}: ${outcome.error ?? 'unknown error'}`);
      }
    }

    this.logger.log(
      `Saved ${summary.inserted} observations (${summary.duplicates} duplicates skipped, ${summary.alertsSent} alerts sent)`,
    );
    return summary;
  }
}
