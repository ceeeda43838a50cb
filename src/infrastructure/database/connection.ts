import Database from 'better-sqlite3';
import type { Result } from '../../shared/types/index.js';
import { Ok } from '../../shared/types/index.js';
import type { DatabaseConfig } from '../../config/index.js';
import type { EnrollmentError } from '../../domain/errors.js';
import { storeFailure } from '../../domain/errors.js';
import type { Logger } from '../../shared/logging/logger.js';
import { silentLogger } from '../../shared/logging/logger.js';

export type DatabaseHandle = Database.Database;

export type DatabaseFactory = (filename: string) => DatabaseHandle;

const openDatabase: DatabaseFactory = (filename) => new Database(filename);

/**
 * 単一接続マネージャ
 *
 * プール・リトライ・タイムアウトは持たない。1プロセス1接続。
 * 参照整合性（PRAGMA foreign_keys）は常に有効にする
 */
export class ConnectionManager {
  private handle: DatabaseHandle | null = null;

  constructor(
    private readonly config: DatabaseConfig,
    private readonly logger: Logger = silentLogger,
    private readonly factory: DatabaseFactory = openDatabase
  ) {}

  /**
   * 開いている接続があればそれを返し、なければ新しく開く
   */
  open(): Result<DatabaseHandle, EnrollmentError> {
    if (this.handle && this.handle.open) {
      return Ok(this.handle);
    }

    let db: DatabaseHandle;
    try {
      db = this.factory(this.config.filename);
    } catch (error) {
      return storeFailure('connect', error);
    }

    try {
      db.pragma('foreign_keys = ON');
    } catch (error) {
      db.close();
      return storeFailure('connect', error);
    }

    this.handle = db;
    this.logger.debug('connect', `opened ${this.config.filename}`);
    return Ok(db);
  }

  isOpen(): boolean {
    return this.handle !== null && this.handle.open;
  }

  /**
   * 接続を閉じる。既に閉じていれば何もしない
   */
  close(): void {
    if (this.handle && this.handle.open) {
      this.handle.close();
      this.logger.debug('connect', 'closed');
    }
    this.handle = null;
  }
}
