import { Injectable, Inject, OnApplicationShutdown, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { storageConfig } from '@app/shared/config/configuration';

const IN_MEMORY = ':memory:';

@Injectable()
export class DatabaseService implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseService.name);
  readonly db: Database.Database;

  constructor(
    @Inject(storageConfig.KEY)
    private readonly storageCfg: ConfigType<typeof storageConfig>,
  ) {
    const dbPath = this.storageCfg.dbPath;
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.initializeSchema();
    this.logger.log(`Database opened: ${dbPath}`);
  }

  /**
   * Run `fn` as one atomic transaction. `fn` must be synchronous:
   * no awaited I/O may happen while a transaction is open.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  /** Closed last, once every loop has drained. */
  onApplicationShutdown(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.log('Database closed');
    }
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS questionnaires (
        chat_id TEXT NOT NULL,
        meeting_id TEXT NOT NULL,
        meeting_name TEXT NOT NULL,
        subject_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'in_progress', 'completed')),
        current_question INTEGER NOT NULL DEFAULT 0,
        answers TEXT NOT NULL DEFAULT '{}',
        outstanding_message_id INTEGER,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (chat_id, meeting_id)
      );

      CREATE INDEX IF NOT EXISTS idx_questionnaires_status ON questionnaires(status);

      CREATE TABLE IF NOT EXISTS processed_meetings (
        meeting_id TEXT PRIMARY KEY,
        processed_at TEXT NOT NULL
      );
    `);
  }
}
