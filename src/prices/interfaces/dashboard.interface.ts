export interface PriceFilters {
  products?: string[];
  from?: string; // YYYY-MM-DD, inclusive
  to?: string; // YYYY-MM-DD, inclusive
}

export interface PricePoint {
  date: string;
  productName: string;
  price: number | null;
  availability: string | null;
  url: string;
}

export interface FilterOptions {
  products: string[];
  dateRange: { min: string; max: string } | null;
}

export interface TrendSeries {
  productName: string;
  url: string;
  points: Array<{ date: string; price: number | null }>;
}
