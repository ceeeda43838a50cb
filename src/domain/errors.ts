import { z } from 'zod';
import type { Result } from '../shared/types/index.js';
import { Err } from '../shared/types/index.js';

// === 基底エラースキーマ ===
const DomainErrorBaseSchema = z.object({
  type: z.string(),
  message: z.string(),
  code: z.string(),
  timestamp: z.date().default(() => new Date()),
  details: z.record(z.unknown()).optional()
});

// === 検証エラー（入力値の問題） ===
const ValidationErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('ValidationError'),
  field: z.string().optional(),
  value: z.unknown().optional()
});

// === ビジネスルールエラー ===
const BusinessRuleSchema = z.enum(['COURSE_FULL', 'ALREADY_ENROLLED']);

const BusinessRuleErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('BusinessRuleError'),
  rule: BusinessRuleSchema,
  context: z.record(z.unknown()).optional()
});

// === 存在しないエンティティエラー ===
const NotFoundErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('NotFoundError'),
  entity: z.enum(['student', 'course']),
  id: z.number()
});

// === ストア（SQLite）側の失敗 ===
const StoreErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('StoreError'),
  operation: z.string()
});

// === 統合エラー型（Discriminated Union） ===
const EnrollmentErrorSchema = z.discriminatedUnion('type', [
  ValidationErrorSchema,
  BusinessRuleErrorSchema,
  NotFoundErrorSchema,
  StoreErrorSchema
]);

export type ValidationError = z.infer<typeof ValidationErrorSchema>;
export type BusinessRule = z.infer<typeof BusinessRuleSchema>;
export type BusinessRuleError = z.infer<typeof BusinessRuleErrorSchema>;
export type NotFoundError = z.infer<typeof NotFoundErrorSchema>;
export type StoreError = z.infer<typeof StoreErrorSchema>;
export type EnrollmentError = z.infer<typeof EnrollmentErrorSchema>;

// === エラーファクトリ関数 ===
export const createValidationError = (
  message: string,
  code: string = 'VALIDATION_FAILED',
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  code,
  timestamp: new Date(),
  field,
  value
});

export const createBusinessRuleError = (
  rule: BusinessRule,
  message: string,
  context?: Record<string, unknown>
): BusinessRuleError => ({
  type: 'BusinessRuleError',
  message,
  code: rule,
  rule,
  context,
  timestamp: new Date()
});

export const createNotFoundError = (
  entity: NotFoundError['entity'],
  id: number
): NotFoundError => ({
  type: 'NotFoundError',
  message: `${entity} ${id} not found.`,
  code: 'NOT_FOUND',
  entity,
  id,
  timestamp: new Date()
});

export const createStoreError = (
  operation: string,
  cause: unknown
): StoreError => ({
  type: 'StoreError',
  message: cause instanceof Error ? cause.message : String(cause),
  code: 'STORE_ERROR',
  operation,
  timestamp: new Date()
});

// === 定型メッセージ ===
export const courseFullError = (courseId: number): BusinessRuleError =>
  createBusinessRuleError('COURSE_FULL', `course ${courseId} is full.`, { courseId });

export const alreadyEnrolledError = (studentId: number, courseId: number): BusinessRuleError =>
  createBusinessRuleError(
    'ALREADY_ENROLLED',
    `student ${studentId} already enrolled in course ${courseId}.`,
    { studentId, courseId }
  );

// === Result型用のエラーファクトリ関数 ===

export const storeFailure = <T>(
  operation: string,
  cause: unknown
): Result<T, EnrollmentError> => {
  return Err(createStoreError(operation, cause));
};
