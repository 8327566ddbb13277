import Database from 'better-sqlite3';

const TRACKER_SCHEMA = `
  CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    url TEXT NOT NULL UNIQUE,
    source TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  );
  INSERT OR IGNORE INTO settings (key, value) VALUES ('email_alerts', '1');
`;

const PRICES_SCHEMA = `
  CREATE TABLE IF NOT EXISTS product (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    url TEXT NOT NULL UNIQUE
  );
  CREATE TABLE IF NOT EXISTS pricehistory (
    id INTEGER PRIMARY KEY,
    product_id INTEGER NOT NULL REFERENCES product(id),
    date TEXT NOT NULL,
    price REAL,
    availability TEXT,
    CONSTRAINT _product_date_uc UNIQUE (product_id, date)
  );
`;

function open(path: string, schema: string): Database.Database {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(schema);
  return db;
}

/** Tracked URLs and global settings */
export function openTrackerDatabase(path: string): Database.Database {
  return open(path, TRACKER_SCHEMA);
}

/** Products and their daily price history */
export function openPricesDatabase(path: string): Database.Database {
  return open(path, PRICES_SCHEMA);
}
