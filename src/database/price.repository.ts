import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import { PRICES_DB } from './database.constants';
import {
  NewPriceObservation,
  PriceHistoryRow,
  PriceObservation,
  PriceObservationRow,
} from './interfaces/database.interface';

function toObservation(row: PriceObservationRow): PriceObservation {
  return {
    id: row.id,
    productId: row.product_id,
    date: row.date,
    price: row.price,
    availability: row.availability,
  };
}

/**
 * prices.db: one product row per URL and at most one observation per product per day
 */
@Injectable()
export class PriceRepository implements OnModuleDestroy {
  constructor(@Inject(PRICES_DB) private readonly db: Database.Database) {}

  /**
   * Insert the product or refresh its name. With `keepExistingName`, an
   * existing row keeps its current name.
   */
  upsertProduct(name: string, url: string, keepExistingName = false): number {
    const sql = keepExistingName
      ? 'INSERT INTO product (name, url) VALUES (?, ?) ON CONFLICT(url) DO NOTHING'
      : 'INSERT INTO product (name, url) VALUES (?, ?) ON CONFLICT(url) DO UPDATE SET name = excluded.name';
    this.db.prepare<[string, string]>(sql).run(name, url);

    const row = this.db.prepare<[string], { id: number }>('SELECT id FROM product WHERE url = ?').get(url);
    if (!row) {
      throw new Error(`Product row missing after upsert for ${url}`);
    }
    return row.id;
  }

  /** Most recent observation strictly before `date` */
  findPreviousObservation(productId: number, date: string): PriceObservation | null {
    const row = this.db
      .prepare<[number, string], PriceObservationRow>(
        `SELECT id, product_id, date, price, availability FROM pricehistory
         WHERE product_id = ? AND date < ?
         ORDER BY date DESC
         LIMIT 1`,
      )
      .get(productId, date);
    return row ? toObservation(row) : null;
  }

  hasObservation(productId: number, date: string): boolean {
    const row = this.db
      .prepare<[number, string], { id: number }>('SELECT id FROM pricehistory WHERE product_id = ? AND date = ?')
      .get(productId, date);
    return row !== undefined;
  }

  insertObservation(observation: NewPriceObservation): number {
    const result = this.db
      .prepare<[number, string, number | null, string | null]>(
        'INSERT INTO pricehistory (product_id, date, price, availability) VALUES (?, ?, ?, ?)',
      )
      .run(observation.productId, observation.date, observation.price, observation.availability);
    return Number(result.lastInsertRowid);
  }

  /**
   * Delete a product and its whole history. Returns the number of history
   * rows removed, or null when the URL has no product row.
   */
  deleteProductByUrl(url: string): number | null {
    const row = this.db.prepare<[string], { id: number }>('SELECT id FROM product WHERE url = ?').get(url);
    if (!row) return null;

    const removeProduct = this.db.transaction((productId: number): number => {
      const history = this.db.prepare<[number]>('DELETE FROM pricehistory WHERE product_id = ?').run(productId);
      this.db.prepare<[number]>('DELETE FROM product WHERE id = ?').run(productId);
      return history.changes;
    });
    return removeProduct(row.id);
  }

  /**
   * Remove every product whose URL is not in `trackedUrls`, with its history.
   * Returns how many products were removed.
   */
  deleteProductsNotIn(trackedUrls: Set<string>): number {
    const orphanIds = this.db
      .prepare<[], { id: number; url: string }>('SELECT id, url FROM product')
      .all()
      .filter((product) => !trackedUrls.has(product.url))
      .map((product) => product.id);

    if (orphanIds.length === 0) return 0;

    const deleteHistory = this.db.prepare<[number]>('DELETE FROM pricehistory WHERE product_id = ?');
    const deleteProduct = this.db.prepare<[number]>('DELETE FROM product WHERE id = ?');
    const removeAll = this.db.transaction((ids: number[]) => {
      for (const id of ids) {
        deleteHistory.run(id);
        deleteProduct.run(id);
      }
    });
    removeAll(orphanIds);
    return orphanIds.length;
  }

  /** Every observation joined with its product, oldest first */
  listHistory(): PriceHistoryRow[] {
    return this.db
      .prepare<[], PriceHistoryRow>(
        `SELECT ph.date AS date, p.name AS product_name, ph.price AS price,
                ph.availability AS availability, p.url AS url
         FROM pricehistory ph
         JOIN product p ON ph.product_id = p.id
         ORDER BY ph.date ASC, p.name ASC`,
      )
      .all();
  }

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
