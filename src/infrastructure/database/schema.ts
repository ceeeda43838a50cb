import { z } from 'zod';
import type { Result } from '../../shared/types/index.js';
import { from, mapError } from '../../shared/types/index.js';
import type { EnrollmentError } from '../../domain/errors.js';
import { createStoreError } from '../../domain/errors.js';
import type { Logger } from '../../shared/logging/logger.js';
import { silentLogger } from '../../shared/logging/logger.js';
import type { DatabaseHandle } from './connection.js';
import type { SeedDataset } from './seed-data.js';

export const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS course (
    course_id INTEGER,
    title TEXT,
    seats_available INTEGER,
    PRIMARY KEY (course_id)
  )`,
  `CREATE TABLE IF NOT EXISTS student (
    student_id INTEGER,
    name TEXT,
    PRIMARY KEY (student_id)
  )`,
  `CREATE TABLE IF NOT EXISTS take (
    course_id INTEGER,
    student_id INTEGER,
    enroll_date TEXT,
    PRIMARY KEY (student_id, course_id),
    FOREIGN KEY (course_id) REFERENCES course (course_id),
    FOREIGN KEY (student_id) REFERENCES student (student_id)
  )`
] as const;

export type SeedTable = 'course' | 'student' | 'take';

export interface BatchReport {
  readonly table: SeedTable;
  readonly inserted: number;
  readonly skipped: boolean;
  readonly error?: EnrollmentError;
}

export interface SeedReport {
  readonly batches: readonly BatchReport[];
}

export interface InitSchemaOptions {
  readonly skipIfPresent?: boolean;
  readonly logger?: Logger;
}

/**
 * 3テーブルを作成する（既にあれば何もしない）
 */
export const createSchema = (
  db: DatabaseHandle,
  logger: Logger = silentLogger
): Result<void, EnrollmentError> => {
  const result = mapError(
    from(() => {
      for (const statement of SCHEMA_STATEMENTS) {
        db.exec(statement);
      }
    }),
    (error) => createStoreError('createSchema', error)
  );

  if (!result.success) {
    logger.error('createSchema', result.error.message);
  }
  return result;
};

const CountRowSchema = z.object({ count: z.number().int() });

/**
 * テーブルの行数
 */
export const countRows = (db: DatabaseHandle, table: SeedTable): number =>
  CountRowSchema.parse(db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get()).count;

/**
 * 1テーブル分の投入。途中で失敗した場合、それまでに入った行は残す
 */
const insertBatch = <Row>(
  db: DatabaseHandle,
  table: SeedTable,
  sql: string,
  rows: readonly Row[],
  toParams: (row: Row) => unknown[],
  options: Required<InitSchemaOptions>
): BatchReport => {
  let inserted = 0;
  try {
    if (options.skipIfPresent && countRows(db, table) > 0) {
      options.logger.debug('initSchema', `${table} already populated, skipping`);
      return { table, inserted, skipped: true };
    }

    const statement = db.prepare(sql);
    for (const row of rows) {
      statement.run(...toParams(row));
      inserted++;
    }
    return { table, inserted, skipped: false };
  } catch (error) {
    const storeError = createStoreError('initSchema', error);
    options.logger.error('initSchema', storeError.message);
    return { table, inserted, skipped: false, error: storeError };
  }
};

/**
 * サンプルデータを投入する
 *
 * course → student → take の順。各バッチは独立しており、
 * あるバッチが失敗しても次のバッチは実行する
 */
export const initSchema = (
  db: DatabaseHandle,
  dataset: SeedDataset,
  options: InitSchemaOptions = {}
): SeedReport => {
  const resolved: Required<InitSchemaOptions> = {
    skipIfPresent: options.skipIfPresent ?? true,
    logger: options.logger ?? silentLogger
  };

  const batches = [
    insertBatch(
      db,
      'course',
      'INSERT INTO course (course_id, title, seats_available) VALUES (?, ?, ?)',
      dataset.courses,
      (course) => [course.course_id, course.title, course.seats_available],
      resolved
    ),
    insertBatch(
      db,
      'student',
      'INSERT INTO student (student_id, name) VALUES (?, ?)',
      dataset.students,
      (student) => [student.student_id, student.name],
      resolved
    ),
    insertBatch(
      db,
      'take',
      'INSERT INTO take (course_id, student_id, enroll_date) VALUES (?, ?, ?)',
      dataset.takes,
      (take) => [take.course_id, take.student_id, take.enroll_date],
      resolved
    )
  ];

  return { batches };
};

export const hasSeedErrors = (report: SeedReport): boolean =>
  report.batches.some((batch) => batch.error !== undefined);
