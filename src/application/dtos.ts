import { z } from 'zod';
import { StudentIdSchema, CourseIdSchema } from '../shared/types/index.js';
import type { EnrollmentError } from '../domain/errors.js';
import { createValidationError } from '../domain/errors.js';
import type { Take } from '../domain/types.js';

// === Command DTOs (入力用) ===

export const EnrollCommandSchema = z.object({
  studentId: StudentIdSchema,
  courseId: CourseIdSchema
});

export type EnrollCommand = z.infer<typeof EnrollCommandSchema>;

// === Response DTOs (出力用) ===

export interface EnrollmentResponse {
  readonly studentId: number;
  readonly courseId: number;
  readonly enrollDate: string;
}

// === DTO Mappers ===

export const mapTakeToResponse = (take: Take): EnrollmentResponse => ({
  studentId: take.studentId,
  courseId: take.courseId,
  enrollDate: take.enrollDate
});

/**
 * コマンド検証失敗を ValidationError に変換する（最初の問題のみ）
 */
export const mapCommandError = (zodError: z.ZodError): EnrollmentError => {
  const issue = zodError.issues[0];
  const field = issue?.path.join('.') || undefined;
  return createValidationError(
    issue ? `invalid ${field ?? 'input'}: ${issue.message}` : 'invalid input',
    'INVALID_COMMAND_FORMAT',
    field
  );
};
