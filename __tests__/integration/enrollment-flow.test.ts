import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { runCli } from '../../src/presentation/cli/session.js';
import { createScriptedConsole } from '../helpers/console.js';
import { createMemoryLogger } from '../helpers/logger.js';
import { createServices } from '../../src/infrastructure/container.js';
import { countRows } from '../../src/infrastructure/database/schema.js';
import { MINIMAL_CONFIG } from '../../src/config/index.js';
import type { EnrollmentConfig } from '../../src/config/index.js';
import { openTestDatabase, buildDataset } from '../helpers/database.js';

const fixedClock = () => new Date(2024, 0, 5, 9, 3, 7);

describe('履修登録の統合テスト', () => {
  describe('ファイルDBをまたぐセッション', () => {
    let dir: string;
    let config: EnrollmentConfig;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'enrollment-'));
      config = {
        ...MINIMAL_CONFIG,
        database: { ...MINIMAL_CONFIG.database, filename: join(dir, 'enrollment.db') },
        seed: { ...MINIMAL_CONFIG.seed, dataset: 'full' }
      };
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const run = async (args: string[], inputs: string[]) => {
      const scripted = createScriptedConsole(inputs);
      const { logger, lines } = createMemoryLogger('debug');
      const code = await runCli(args, { config, io: scripted.io, logger, clock: fixedClock });
      return { code, lines, stdout: scripted.stdout(), stderr: scripted.stderr() };
    };

    test('登録は次のセッションにも残り、二重登録は拒否される', async () => {
      const first = await run(['enroll'], ['12', '1']);
      expect(first.code).toBe(0);
      expect(first.stdout.endsWith('Student 12 successfully enrolled in course 1\n')).toBe(true);

      const second = await run(['enroll'], ['12', '1']);
      expect(second.code).toBe(0);
      expect(second.stderr).toEqual(['[ERROR] enroll : student 12 already enrolled in course 1.']);

      const db = new Database(config.database.filename, { readonly: true });
      try {
        expect(db.prepare('SELECT seats_available FROM course WHERE course_id = 1').pluck().get()).toBe(199);
        expect(
          db.prepare('SELECT enroll_date FROM take WHERE student_id = 12 AND course_id = 1').pluck().get()
        ).toBe('2024-01-05 09:03:07');
        expect(db.prepare('SELECT COUNT(*) FROM take').pluck().get()).toBe(6);
      } finally {
        db.close();
      }
    });

    test('2回目の起動では初期データ投入をスキップする', async () => {
      await run(['paginate'], ['5']);

      const second = await run(['paginate'], ['5']);

      expect(second.lines).toContain('[DEBUG] initSchema : course already populated, skipping');
      expect(second.lines).toContain('[DEBUG] initSchema : student already populated, skipping');
      expect(second.lines).toContain('[DEBUG] initSchema : take already populated, skipping');
      expect(second.lines.filter((line) => line.startsWith('[ERROR]'))).toEqual([]);
      expect(second.stderr).toEqual([]);
      expect(second.stdout.match(/Page \d+$/gm)).toEqual(['Page 1', 'Page 2']);
    });

    test('投入に失敗したバッチがあれば警告して続行する', async () => {
      await run(['paginate'], ['5']);
      config = { ...config, seed: { ...config.seed, skipIfPresent: false } };

      const second = await run(['paginate'], ['5']);

      expect(second.code).toBe(0);
      expect(second.lines.filter((line) => line.startsWith('[ERROR] initSchema : '))).toHaveLength(3);
      expect(second.lines).toContain('[WARN] initSchema : seed data is incomplete');
      expect(second.stdout.match(/Page \d+$/gm)).toEqual(['Page 1', 'Page 2']);
    });
  });

  describe('席が埋まるまで', () => {
    test('最後の1席を取ると以降は満席', () => {
      const db = openTestDatabase(
        buildDataset({
          courses: [{ course_id: 7, title: 'CMPUT379', seats_available: 2 }],
          students: [
            { student_id: 1, name: 'Ada' },
            { student_id: 2, name: 'Alan' },
            { student_id: 3, name: 'Grace' }
          ]
        })
      );
      const { enrollment } = createServices(db, MINIMAL_CONFIG, fixedClock);

      try {
        expect(enrollment.enroll(1, 7).success).toBe(true);
        expect(enrollment.enroll(2, 7).success).toBe(true);

        const third = enrollment.enroll(3, 7);

        expect(third.success).toBe(false);
        if (!third.success) {
          expect(third.error.message).toBe('course 7 is full.');
        }
        expect(countRows(db, 'take')).toBe(2);
        expect(db.prepare('SELECT seats_available FROM course WHERE course_id = 7').pluck().get()).toBe(0);
      } finally {
        db.close();
      }
    });
  });
});
