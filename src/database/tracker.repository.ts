import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import { TRACKER_DB } from './database.constants';
import { TrackedProduct, TrackedProductRow } from './interfaces/database.interface';

const EMAIL_ALERTS_KEY = 'email_alerts';

function toTrackedProduct(row: TrackedProductRow): TrackedProduct {
  return {
    id: row.id,
    url: row.url,
    source: row.source,
    createdAt: row.created_at,
  };
}

/**
 * tracker.db: the URLs the user asked to follow plus global settings
 */
@Injectable()
export class TrackerRepository implements OnModuleDestroy {
  constructor(@Inject(TRACKER_DB) private readonly db: Database.Database) {}

  /**
   * Insert a URL unless it is already tracked. Returns the row id either way,
   * or -1 if the row cannot be found afterwards.
   */
  addUrl(url: string, source: string, createdAt: string = new Date().toISOString()): number {
    this.db
      .prepare<[string, string, string]>('INSERT OR IGNORE INTO products (url, source, created_at) VALUES (?, ?, ?)')
      .run(url, source, createdAt);
    const row = this.db.prepare<[string], { id: number }>('SELECT id FROM products WHERE url = ?').get(url);
    return row ? row.id : -1;
  }

  /** Newest first */
  getUrls(): TrackedProduct[] {
    return this.db
      .prepare<[], TrackedProductRow>('SELECT id, url, source, created_at FROM products ORDER BY created_at DESC, id DESC')
      .all()
      .map(toTrackedProduct);
  }

  getUrl(id: number): TrackedProduct | null {
    const row = this.db
      .prepare<[number], TrackedProductRow>('SELECT id, url, source, created_at FROM products WHERE id = ?')
      .get(id);
    return row ? toTrackedProduct(row) : null;
  }

  getTrackedUrls(): Set<string> {
    const rows = this.db.prepare<[], { url: string }>('SELECT url FROM products').all();
    return new Set(rows.map((row) => row.url));
  }

  /**
   * Remove a tracked URL. Returns the URL that was removed, or null for an unknown id.
   */
  deleteUrl(id: number): string | null {
    const row = this.db.prepare<[number], { url: string }>('SELECT url FROM products WHERE id = ?').get(id);
    if (!row) return null;
    this.db.prepare<[number]>('DELETE FROM products WHERE id = ?').run(id);
    return row.url;
  }

  setEmailAlerts(enabled: boolean): void {
    this.db
      .prepare<[string, string]>('REPLACE INTO settings (key, value) VALUES (?, ?)')
      .run(EMAIL_ALERTS_KEY, enabled ? '1' : '0');
  }

  /** Defaults to enabled when the setting row is missing */
  getEmailAlerts(): boolean {
    const row = this.db
      .prepare<[string], { value: string | null }>('SELECT value FROM settings WHERE key = ?')
      .get(EMAIL_ALERTS_KEY);
    return row ? row.value === '1' : true;
  }

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
