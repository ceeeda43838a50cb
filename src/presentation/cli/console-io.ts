import { createInterface } from 'node:readline';

/**
 * 対話入出力
 */
export interface ConsoleIO {
  /** 標準出力へ1行 */
  writeLine(line: string): void;
  /** 標準エラー出力へ1行 */
  error(line: string): void;
  /**
   * プロンプトを出して1行読む。入力が尽きていれば null
   */
  ask(prompt: string): Promise<string | null>;
}

export interface ClosableConsoleIO extends ConsoleIO {
  close(): void;
}

/**
 * 標準入出力版
 *
 * readline の async iterator で行をバッファするため、パイプで先に全行が届いても取りこぼさない
 */
export const createStdio = (
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ClosableConsoleIO => {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    writeLine: (line) => {
      output.write(`${line}\n`);
    },
    error: (line) => {
      console.error(line);
    },
    async ask(prompt) {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => {
      rl.close();
    }
  };
};
