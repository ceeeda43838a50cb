import { z } from 'zod';

/**
 * ブランド型定義
 *
 * テーブルの主キーは整数だが、学生IDと科目IDを取り違えないよう型で区別する
 */

// === 基本識別子 ===

export const StudentIdSchema = z.number()
  .int()
  .refine(Number.isSafeInteger, 'Student ID must be a safe integer')
  .brand<'StudentId'>();

export const CourseIdSchema = z.number()
  .int()
  .refine(Number.isSafeInteger, 'Course ID must be a safe integer')
  .brand<'CourseId'>();

export type StudentId = z.infer<typeof StudentIdSchema>;
export type CourseId = z.infer<typeof CourseIdSchema>;

/**
 * 標準入力などの文字列を整数として読む。符号付き十進数のみ受け付ける
 */
export const IntegerInputSchema = z.string()
  .trim()
  .regex(/^[+-]?\d+$/, 'Expected an integer')
  .transform(Number)
  .pipe(z.number().int().refine(Number.isSafeInteger, 'Integer out of range'));
