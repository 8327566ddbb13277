import { appConfig } from '../../config/app.config';

export const scraperConfig = {
  sites: {
    amazon: {
      name: 'Amazon',
    },
    ebay: {
      name: 'eBay',
    },
    etsy: {
      name: 'Etsy',
    },
  },
  scraping: {
    scrapeOnStart: appConfig.scraping.scrapeOnStart,
    requestTimeout: appConfig.scraping.requestTimeout,
    retryAttempts: appConfig.scraping.retryAttempts,
    retryDelay: appConfig.scraping.retryDelay,
    userAgent: appConfig.scraping.userAgent,
    snapshotDir: appConfig.scraping.snapshotDir,
  },
};
