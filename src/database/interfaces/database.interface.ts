/**
 * Row shapes for tracker.db and prices.db
 */

export interface TrackedProductRow {
  id: number;
  url: string;
  source: string;
  created_at: string;
}

export interface TrackedProduct {
  id: number;
  url: string;
  source: string;
  createdAt: string; // ISO 8601
}

export interface PriceObservationRow {
  id: number;
  product_id: number;
  date: string;
  price: number | null;
  availability: string | null;
}

export interface PriceObservation {
  id: number;
  productId: number;
  date: string; // YYYY-MM-DD
  price: number | null;
  availability: string | null;
}

export interface NewPriceObservation {
  productId: number;
  date: string;
  price: number | null;
  availability: string | null;
}

export interface PriceHistoryRow {
  date: string;
  product_name: string;
  price: number | null;
  availability: string | null;
  url: string;
}
