import { Injectable } from '@nestjs/common';
import { stringify } from 'csv-stringify/sync';
import { PriceRepository } from '../database/price.repository';
import { TrackerService } from '../tracker/tracker.service';
import { FilterOptions, PriceFilters, PricePoint, TrendSeries } from './interfaces/dashboard.interface';

export const CSV_HEADER = ['date', 'product_name', 'price', 'availability', 'url'];

const byProductName = (a: string, b: string): number => a.localeCompare(b);

/**
 * Read side of the dashboard: only products that are still tracked are shown
 */
@Injectable()
export class DashboardService {
  constructor(
    private readonly priceRepository: PriceRepository,
    private readonly trackerService: TrackerService,
  ) {}

  /** Every observation for tracked products, by date then product name */
  loadData(): PricePoint[] {
    const trackedUrls = this.trackerService.getTrackedUrls();
    return this.priceRepository
      .listHistory()
      .filter((row) => trackedUrls.has(row.url))
      .map((row) => ({
        date: row.date,
        productName: row.product_name,
        price: row.price,
        availability: row.availability,
        url: row.url,
      }))
      .sort((a, b) => a.date.localeCompare(b.date) || byProductName(a.productName, b.productName));
  }

  getPrices(filters: PriceFilters = {}): PricePoint[] {
    const selected = filters.products && filters.products.length > 0 ? new Set(filters.products) : null;
    return this.loadData().filter(
      (point) =>
        (!selected || selected.has(point.productName)) &&
        (!filters.from || point.date >= filters.from) &&
        (!filters.to || point.date <= filters.to),
    );
  }

  getFilterOptions(): FilterOptions {
    const data = this.loadData();
    if (data.length === 0) {
      return { products: [], dateRange: null };
    }

    const products = [...new Set(data.map((point) => point.productName))].sort(byProductName);
    const dates = data.map((point) => point.date).sort();
    return { products, dateRange: { min: dates[0], max: dates[dates.length - 1] } };
  }

  /** Most recent observation per product, ordered by product name */
  getLatest(filters: PriceFilters = {}): PricePoint[] {
    const latest = new Map<string, PricePoint>();
    for (const point of this.getPrices(filters)) {
      const current = latest.get(point.productName);
      if (!current || point.date >= current.date) {
        latest.set(point.productName, point);
      }
    }
    return [...latest.values()].sort((a, b) => byProductName(a.productName, b.productName));
  }

  getTrends(filters: PriceFilters = {}): TrendSeries[] {
    const series = new Map<string, TrendSeries>();
    for (const point of this.getPrices(filters)) {
      let entry = series.get(point.productName);
      if (!entry) {
        entry = { productName: point.productName, url: point.url, points: [] };
        series.set(point.productName, entry);
      }
      entry.points.push({ date: point.date, price: point.price });
    }

    return [...series.values()]
      .map((entry) => ({ ...entry, points: [...entry.points].sort((a, b) => a.date.localeCompare(b.date)) }))
      .sort((a, b) => byProductName(a.productName, b.productName));
  }

  exportCsv(filters: PriceFilters = {}): string {
    const records = this.getPrices(filters).map((point) => ({
      date: point.date,
      product_name: point.productName,
      price: point.price,
      availability: point.availability,
      url: point.url,
    }));
    return stringify(records, { header: true, columns: CSV_HEADER });
  }
}
