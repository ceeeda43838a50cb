import type { EnrollmentConfig } from '../../config/index.js';
import type { Clock } from '../../domain/enroll-date.js';
import { systemClock } from '../../domain/enroll-date.js';
import type { Logger } from '../../shared/logging/logger.js';
import { ConnectionManager } from '../../infrastructure/database/connection.js';
import type { DatabaseHandle } from '../../infrastructure/database/connection.js';
import { createSchema, hasSeedErrors, initSchema } from '../../infrastructure/database/schema.js';
import type { SeedReport } from '../../infrastructure/database/schema.js';
import { SEED_DATASETS } from '../../infrastructure/database/seed-data.js';
import { createServices } from '../../infrastructure/container.js';
import type { ConsoleIO } from './console-io.js';
import { runEnrollCommand, runPaginateCommand } from './commands.js';

export type CliCommand = 'enroll' | 'paginate';

export const USAGE_MESSAGE =
  "The program requires an argument, which can be either 'paginate' or 'enroll'";

export const INITIALIZATION_BANNER = 'Initialization complete!!';

export interface SessionDependencies {
  readonly config: EnrollmentConfig;
  readonly io: ConsoleIO;
  readonly logger: Logger;
  readonly clock?: Clock;
}

/**
 * 第1引数をコマンドとして解釈する（大文字小文字は区別しない）
 */
export const parseCommand = (arg: string | undefined): CliCommand | null => {
  const normalized = arg?.toLowerCase();
  return normalized === 'enroll' || normalized === 'paginate' ? normalized : null;
};

/**
 * スキーマ作成と初期データ投入
 */
export const bootstrap = (
  db: DatabaseHandle,
  config: EnrollmentConfig,
  logger: Logger
): SeedReport => {
  // 作成失敗はログに出し、投入側の失敗として続行する
  createSchema(db, logger);
  return initSchema(db, SEED_DATASETS[config.seed.dataset], {
    skipIfPresent: config.seed.skipIfPresent,
    logger
  });
};

/**
 * 接続 → 初期化 → コマンド実行 → 切断。戻り値は終了コード
 */
export const runSession = async (
  command: CliCommand,
  deps: SessionDependencies
): Promise<number> => {
  const { config, io, logger } = deps;
  const connection = new ConnectionManager(config.database, logger);

  const opened = connection.open();
  if (!opened.success) {
    logger.fatal('connect', opened.error.message);
    return 1;
  }

  try {
    const db = opened.data;
    if (hasSeedErrors(bootstrap(db, config, logger))) {
      logger.warn('initSchema', 'seed data is incomplete');
    }
    io.writeLine(INITIALIZATION_BANNER);

    const context = {
      services: createServices(db, config, deps.clock ?? systemClock),
      io,
      pagination: config.pagination
    };

    if (command === 'paginate') {
      await runPaginateCommand(context);
    } else {
      await runEnrollCommand(context);
    }
    return 0;
  } finally {
    connection.close();
  }
};

/**
 * 引数付きのエントリポイント
 */
export const runCli = async (
  args: readonly string[],
  deps: SessionDependencies
): Promise<number> => {
  const command = parseCommand(args[0]);
  if (command === null) {
    deps.io.error(USAGE_MESSAGE);
    return 1;
  }
  return runSession(command, deps);
};
