import { describe, test, expect } from 'vitest';
import {
  createNotFoundError,
  createStoreError,
  createValidationError,
  courseFullError,
  alreadyEnrolledError
} from '../../src/domain/errors.js';
import { formatEnrollDate } from '../../src/domain/enroll-date.js';

describe('ドメインエラー', () => {
  test('NotFoundError のメッセージ', () => {
    const error = createNotFoundError('course', 7);
    expect(error.message).toBe('course 7 not found.');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.type).toBe('NotFoundError');
  });

  test('定員超過と重複登録', () => {
    const full = courseFullError(2);
    expect(full.rule).toBe('COURSE_FULL');
    expect(full.message).toBe('course 2 is full.');

    const duplicate = alreadyEnrolledError(11, 1);
    expect(duplicate.rule).toBe('ALREADY_ENROLLED');
    expect(duplicate.message).toBe('student 11 already enrolled in course 1.');
    expect(duplicate.type).toBe('BusinessRuleError');
  });

  test('StoreError は元の例外メッセージを持つ', () => {
    const error = createStoreError('enroll', new Error('disk I/O error'));
    expect(error.message).toBe('disk I/O error');
    expect(error.operation).toBe('enroll');
    expect(error.type).toBe('StoreError');
  });

  test('ValidationError は項目と値を持つ', () => {
    const error = createValidationError("invalid student id 'abc'", 'INVALID_INPUT', 'student id', 'abc');
    expect(error).toMatchObject({
      type: 'ValidationError',
      code: 'INVALID_INPUT',
      field: 'student id',
      value: 'abc'
    });
  });
});

describe('履修日時の書式', () => {
  test('YYYY-MM-DD HH:MM:SS（ローカル時刻、ゼロ埋め）', () => {
    expect(formatEnrollDate(new Date(2017, 8, 1, 0, 0, 0))).toBe('2017-09-01 00:00:00');
    expect(formatEnrollDate(new Date(2024, 11, 31, 23, 59, 59))).toBe('2024-12-31 23:59:59');
    expect(formatEnrollDate(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
  });
});
