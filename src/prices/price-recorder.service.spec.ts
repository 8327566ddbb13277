import { Test, TestingModule } from '@nestjs/testing';
import { inMemoryDatabaseProviders } from '../../test/database.fixture';
import { PriceRepository } from '../database/price.repository';
import { EmailResult, EmailService } from '../notifications/email.service';
import { ScrapedProduct } from '../scraper/interfaces/price.interface';
import { TrackerService } from '../tracker/tracker.service';
import { PriceRecorderService } from './price-recorder.service';

const LAMP = 'https://www.amazon.com/dp/LAMP';

function scraped(overrides: Partial<ScrapedProduct> = {}): ScrapedProduct {
  return {
    date: '2024-05-02',
    productName: 'Desk Lamp',
    price: '15.00',
    availability: 'In Stock',
    url: LAMP,
    ...overrides,
  };
}

describe('PriceRecorderService', () => {
  let moduleRef: TestingModule;
  let recorder: PriceRecorderService;
  let priceRepository: PriceRepository;
  let trackerService: TrackerService;
  let sendPriceDropAlert: jest.Mock<Promise<EmailResult>>;

  beforeEach(async () => {
    sendPriceDropAlert = jest.fn().mockResolvedValue({ success: true, messageId: 'msg-1' });

    moduleRef = await Test.createTestingModule({
      providers: [
        ...inMemoryDatabaseProviders(),
        TrackerService,
        PriceRecorderService,
        { provide: EmailService, useValue: { sendPriceDropAlert } },
      ],
    }).compile();

    recorder = moduleRef.get(PriceRecorderService);
    priceRepository = moduleRef.get(PriceRepository);
    trackerService = moduleRef.get(TrackerService);
    trackerService.addProduct(LAMP, 'amazon');
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  async function seedPreviousDay(price: string): Promise<void> {
    await recorder.saveResults([scraped({ date: '2024-05-01', price })]);
    sendPriceDropAlert.mockClear();
  }

  it('stores cleaned names and availability with a numeric price', async () => {
    const summary = await recorder.saveResults([
      scraped({ productName: '  Desk\n  Lamp ', availability: ' In   Stock ', price: '1234.56' }),
    ]);

    expect(summary).toEqual({ inserted: 1, duplicates: 0, alertsSent: 0 });
    expect(priceRepository.listHistory()).toEqual([
      { date: '2024-05-02', product_name: 'Desk Lamp', price: 1234.56, availability: 'In Stock', url: LAMP },
    ]);
  });

  it('stores NA as a null price', async () => {
    await recorder.saveResults([scraped({ price: 'NA', availability: '' })]);

    expect(priceRepository.listHistory()[0]).toMatchObject({ price: null, availability: 'Unknown' });
  });

  it('skips a second observation on the same day', async () => {
    await recorder.saveResults([scraped({ price: '15.00' })]);
    const summary = await recorder.saveResults([scraped({ price: '14.00' })]);

    expect(summary).toEqual({ inserted: 0, duplicates: 1, alertsSent: 0 });
    expect(priceRepository.listHistory().map((row) => row.price)).toEqual([15]);
  });

  it('keeps the product name when a scrape failed', async () => {
    await seedPreviousDay('20.00');
    await recorder.saveResults([scraped({ productName: 'Timeout', price: 'NA', availability: 'Unknown' })]);

    expect(priceRepository.listHistory().map((row) => row.product_name)).toEqual(['Desk Lamp', 'Desk Lamp']);
  });

  describe('price drop alerts', () => {
    it('alerts when the price fell since the previous observation', async () => {
      await seedPreviousDay('20.00');

      const summary = await recorder.saveResults([scraped({ price: '15.00' })]);

      expect(summary.alertsSent).toBe(1);
      expect(sendPriceDropAlert).toHaveBeenCalledWith({
        productName: 'Desk Lamp',
        oldPrice: 20,
        newPrice: 15,
        url: LAMP,
      });
    });

    it('does not alert on an unchanged or higher price', async () => {
      await seedPreviousDay('15.00');

      await recorder.saveResults([scraped({ date: '2024-05-02', price: '15.00' })]);
      await recorder.saveResults([scraped({ date: '2024-05-03', price: '16.00' })]);

      expect(sendPriceDropAlert).not.toHaveBeenCalled();
    });

    it('does not alert when either price is missing', async () => {
      await seedPreviousDay('NA');
      await recorder.saveResults([scraped({ date: '2024-05-02', price: '10.00' })]);
      await recorder.saveResults([scraped({ date: '2024-05-03', price: 'NA' })]);

      expect(sendPriceDropAlert).not.toHaveBeenCalled();
    });

    it('does not alert when alerts are disabled', async () => {
      await seedPreviousDay('20.00');
      trackerService.setEmailAlerts(false);

      await recorder.saveResults([scraped({ price: '15.00' })]);

      expect(sendPriceDropAlert).not.toHaveBeenCalled();
    });

    it('sends one alert per product and price pair within a batch', async () => {
      await seedPreviousDay('20.00');

      const summary = await recorder.saveResults([scraped({ price: '15.00' }), scraped({ price: '15.00' })]);

      expect(summary).toEqual({ inserted: 1, duplicates: 1, alertsSent: 1 });
      expect(sendPriceDropAlert).toHaveBeenCalledTimes(1);
    });

    it('keeps saving when an alert cannot be sent', async () => {
      await seedPreviousDay('20.00');
      sendPriceDropAlert.mockResolvedValue({ success: false, error: 'rate limited' });

      const summary = await recorder.saveResults([scraped({ price: '15.00' })]);

      expect(summary).toEqual({ inserted: 1, duplicates: 0, alertsSent: 0 });
      expect(priceRepository.listHistory()).toHaveLength(2);
    });
  });
});
