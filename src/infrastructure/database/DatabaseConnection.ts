import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbPath - file name under `dataDir`, an absolute path, or ':memory:'
   * @param dataDir - directory for relative file names (default ./data)
   */
  constructor(dbPath: string = 'jobs.db', dataDir: string = path.resolve(process.cwd(), 'data')) {
    if (dbPath === IN_MEMORY_DATABASE) {
      this.dbPath = dbPath;
    } else {
      this.dbPath = path.isAbsolute(dbPath) ? dbPath : path.resolve(dataDir, dbPath);

      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (dbPath !== IN_MEMORY_DATABASE) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        external_id TEXT NOT NULL UNIQUE,
        operation_slug TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        progress INTEGER NOT NULL DEFAULT 0,
        total_items INTEGER NOT NULL DEFAULT 0,
        processed_items INTEGER NOT NULL DEFAULT 0,
        result TEXT,
        error TEXT,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        owner_id TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_job_owner ON jobs(owner_id);
      CREATE INDEX IF NOT EXISTS idx_job_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_job_slug ON jobs(operation_slug);
      CREATE INDEX IF NOT EXISTS idx_job_created ON jobs(created_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  /**
   * File size in bytes; 0 for in-memory databases or before the first write
   */
  getDatabaseSize(): number {
    if (this.dbPath === IN_MEMORY_DATABASE || !fs.existsSync(this.dbPath)) {
      return 0;
    }
    return fs.statSync(this.dbPath).size;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
