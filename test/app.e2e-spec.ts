import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { PRICES_DB, TRACKER_DB } from '../src/database/database.constants';
import { openPricesDatabase, openTrackerDatabase } from '../src/database/sqlite';
import { EMAIL_OPTIONS } from '../src/notifications/notifications.constants';
import { SITE_PARSERS, createSiteParsers } from '../src/scraper/parsers/site-registry';
import { SCRAPE_ON_START, ScraperService } from '../src/scraper/scraper.service';
import { formatDate } from '../src/scraper/utils/text.util';

const AMAZON_URL = 'https://www.amazon.com/dp/B000TEST10';
const EBAY_URL = 'https://www.ebay.com/itm/100000000010';

const PAGES: Record<string, string> = {
  [AMAZON_URL]: '<span id="productTitle">Desk Lamp</span><span id="priceblock_ourprice">$24.00</span>',
  [EBAY_URL]:
    '<h1>Board Game</h1><div class="x-price-primary"><span class="ux-textspans">US $15.50</span></div>',
};

describe('Price tracker API (e2e)', () => {
  let app: INestApplication;
  const today = formatDate(new Date());

  beforeAll(async () => {
    const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
      data: PAGES[config.url ?? ''] ?? '',
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    });

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(TRACKER_DB)
      .useValue(openTrackerDatabase(':memory:'))
      .overrideProvider(PRICES_DB)
      .useValue(openPricesDatabase(':memory:'))
      .overrideProvider(EMAIL_OPTIONS)
      .useValue({})
      .overrideProvider(SCRAPE_ON_START)
      .useValue(false)
      .overrideProvider(SITE_PARSERS)
      .useValue(createSiteParsers({ httpClient: axios.create({ adapter }), retryDelay: 0 }))
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /api/health', async () => {
    await request(app.getHttpServer()).get('/api/health').expect(200, { status: 'ok' });
  });

  describe('tracked products', () => {
    it('adds products', async () => {
      const amazon = await request(app.getHttpServer())
        .post('/api/products')
        .send({ url: `  ${AMAZON_URL} `, source: 'amazon' })
        .expect(201);
      expect(amazon.body).toMatchObject({ id: 1, url: AMAZON_URL, source: 'amazon' });
      expect(typeof amazon.body.createdAt).toBe('string');

      const ebay = await request(app.getHttpServer())
        .post('/api/products')
        .send({ url: EBAY_URL, source: 'ebay' })
        .expect(201);
      expect(ebay.body).toMatchObject({ id: 2, url: EBAY_URL, source: 'ebay' });
    });

    it('rejects an unsupported source', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/products')
        .send({ url: 'https://shop.example.com/item/1', source: 'walmart' })
        .expect(400);
      expect(response.body.message).toBe('Validation failed');
    });

    it('lists products newest first', async () => {
      const response = await request(app.getHttpServer()).get('/api/products').expect(200);
      expect(response.body.map((product: { id: number }) => product.id)).toEqual([2, 1]);
    });
  });

  describe('email alert setting', () => {
    it('defaults to enabled and can be switched off', async () => {
      await request(app.getHttpServer()).get('/api/settings/email-alerts').expect(200, { enabled: true });
      await request(app.getHttpServer())
        .put('/api/settings/email-alerts')
        .send({ enabled: false })
        .expect(200, { enabled: false });
      await request(app.getHttpServer()).get('/api/settings/email-alerts').expect(200, { enabled: false });
    });

    it('rejects a non-boolean value', async () => {
      await request(app.getHttpServer()).put('/api/settings/email-alerts').send({ enabled: 'no' }).expect(400);
    });
  });

  describe('dashboard', () => {
    beforeAll(async () => {
      await app.get(ScraperService).scrapeAll();
    });

    it('GET /api/prices returns every observation', async () => {
      const response = await request(app.getHttpServer()).get('/api/prices').expect(200);
      expect(response.body).toEqual([
        { date: today, productName: 'Board Game', price: 15.5, availability: 'In Stock', url: EBAY_URL },
        { date: today, productName: 'Desk Lamp', price: 24, availability: 'In Stock', url: AMAZON_URL },
      ]);
    });

    it('filters by product name', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/prices')
        .query({ product: 'Desk Lamp' })
        .expect(200);
      expect(response.body.map((point: { productName: string }) => point.productName)).toEqual(['Desk Lamp']);
    });

    it('rejects a date range that ends before it starts', async () => {
      await request(app.getHttpServer())
        .get('/api/prices')
        .query({ from: '2024-05-10', to: '2024-05-01' })
        .expect(400);
    });

    it('GET /api/prices/products', async () => {
      await request(app.getHttpServer())
        .get('/api/prices/products')
        .expect(200, { products: ['Board Game', 'Desk Lamp'], dateRange: { min: today, max: today } });
    });

    it('GET /api/prices/latest', async () => {
      const response = await request(app.getHttpServer()).get('/api/prices/latest').expect(200);
      expect(response.body.map((point: { price: number }) => point.price)).toEqual([15.5, 24]);
    });

    it('GET /api/prices/trends', async () => {
      const response = await request(app.getHttpServer()).get('/api/prices/trends').expect(200);
      expect(response.body).toEqual([
        { productName: 'Board Game', url: EBAY_URL, points: [{ date: today, price: 15.5 }] },
        { productName: 'Desk Lamp', url: AMAZON_URL, points: [{ date: today, price: 24 }] },
      ]);
    });

    it('GET /api/prices/export.csv', async () => {
      const response = await request(app.getHttpServer()).get('/api/prices/export.csv').expect(200);
      expect(response.headers['content-type']).toMatch(/^text\/csv/);
      expect(response.headers['content-disposition']).toBe('attachment; filename="price_data.csv"');
      expect(response.text).toBe(
        'date,product_name,price,availability,url\n' +
          `${today},Board Game,15.5,In Stock,${EBAY_URL}\n` +
          `${today},Desk Lamp,24,In Stock,${AMAZON_URL}\n`,
      );
    });
  });

  describe('scraping', () => {
    it('POST /api/scrape starts a background run', async () => {
      const response = await request(app.getHttpServer()).post('/api/scrape').expect(202);
      expect(response.body.isScraping).toBe(true);

      await app.get(ScraperService).scrapeAll();

      const progress = await request(app.getHttpServer()).get('/api/scrape/progress').expect(200);
      expect(progress.body.isScraping).toBe(false);
      expect(progress.body.progress).toEqual([
        { url: EBAY_URL, site: 'ebay', status: 'completed' },
        { url: AMAZON_URL, site: 'amazon', status: 'completed' },
      ]);
      expect(progress.body.lastRun).toMatchObject({ scraped: 2, skipped: 0, failed: 0 });
    });

    it('POST /api/scrape/preview scrapes one URL', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape/preview')
        .send({ url: AMAZON_URL, source: 'Amazon' })
        .expect(200);
      expect(response.body).toEqual({
        date: today,
        productName: 'Desk Lamp',
        price: '24.00',
        availability: 'In Stock',
        url: AMAZON_URL,
      });
    });

    it('rejects a preview without a URL', async () => {
      await request(app.getHttpServer()).post('/api/scrape/preview').send({ source: 'amazon' }).expect(400);
    });
  });

  describe('removing a product', () => {
    it('deletes the product and its price history', async () => {
      await request(app.getHttpServer()).delete('/api/products/1').expect(204);

      const products = await request(app.getHttpServer()).get('/api/products').expect(200);
      expect(products.body.map((product: { id: number }) => product.id)).toEqual([2]);

      const prices = await request(app.getHttpServer()).get('/api/prices').expect(200);
      expect(prices.body.map((point: { url: string }) => point.url)).toEqual([EBAY_URL]);
    });

    it('returns 404 for an unknown id', async () => {
      await request(app.getHttpServer()).delete('/api/products/1').expect(404);
    });

    it('returns 400 for a non-numeric id', async () => {
      await request(app.getHttpServer()).delete('/api/products/abc').expect(400);
    });
  });
});
