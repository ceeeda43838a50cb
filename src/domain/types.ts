import { z } from 'zod';
import {
  StudentIdSchema,
  CourseIdSchema,
  type StudentId,
  type CourseId
} from '../shared/types/index.js';

/**
 * エンティティ定義
 *
 * テーブル行（snake_case）とドメイン型（camelCase）を分けて持ち、
 * 行はzodで検証してから変換する
 */

// === テーブル行 ===

export const CourseRowSchema = z.object({
  course_id: CourseIdSchema,
  title: z.string(),
  seats_available: z.number().int().nonnegative()
});

export const StudentRowSchema = z.object({
  student_id: StudentIdSchema,
  name: z.string()
});

export const TakeRowSchema = z.object({
  course_id: CourseIdSchema,
  student_id: StudentIdSchema,
  enroll_date: z.string()
});

export type CourseRow = z.infer<typeof CourseRowSchema>;
export type StudentRow = z.infer<typeof StudentRowSchema>;
export type TakeRow = z.infer<typeof TakeRowSchema>;

// === ドメイン型 ===

export const StudentSchema = StudentRowSchema.transform((row) => ({
  studentId: row.student_id,
  name: row.name
}));

export type Student = z.infer<typeof StudentSchema>;

/**
 * 履修記録。登録時に組み立てて take テーブルへ書く
 */
export interface Take {
  readonly studentId: StudentId;
  readonly courseId: CourseId;
  readonly enrollDate: string;
}

/**
 * 学生一覧の1ページ分
 */
export interface StudentPage {
  readonly pageNumber: number;
  readonly students: readonly Student[];
  /** 次ページ取得時のカーソル（このページ最後の student_id） */
  readonly lastId: StudentId;
}

export type { StudentId, CourseId };
