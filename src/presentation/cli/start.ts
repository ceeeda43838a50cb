import { loadConfig } from '../../config/index.js';
import type { ConfigOverrides } from '../../config/index.js';
import { Logger } from '../../shared/logging/logger.js';
import { createStdio } from './console-io.js';
import { runCli, runSession } from './session.js';
import type { CliCommand } from './session.js';

export interface StartOptions {
  /** 指定時は引数を解釈せずこのコマンドを実行する */
  readonly command?: CliCommand;
  readonly overrides?: ConfigOverrides;
}

/**
 * 設定を読み込み、標準入出力でセッションを動かす。戻り値は終了コード
 */
export const startCli = async (
  args: readonly string[],
  options: StartOptions = {}
): Promise<number> => {
  const loaded = loadConfig(options.overrides);
  if (!loaded.success) {
    new Logger().fatal('config', loaded.error.message);
    return 1;
  }

  const config = loaded.config;
  const logger = new Logger(config.logging.level);
  const io = createStdio();
  try {
    const deps = { config, io, logger };
    return options.command
      ? await runSession(options.command, deps)
      : await runCli(args, deps);
  } finally {
    io.close();
  }
};

/**
 * プロセスの終了コードを設定する。想定外の例外は FATAL として出す
 */
export const exitWith = (run: Promise<number>): void => {
  void run.then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      new Logger().fatal('main', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  );
};
