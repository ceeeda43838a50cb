import type { CourseRow, StudentRow, TakeRow } from '../../domain/types.js';
import {
  CourseRowSchema,
  StudentRowSchema,
  TakeRowSchema
} from '../../domain/types.js';

/**
 * 起動時に投入するサンプルデータ
 */
export interface SeedDataset {
  readonly courses: readonly CourseRow[];
  readonly students: readonly StudentRow[];
  readonly takes: readonly TakeRow[];
}

export type SeedDatasetName = 'full' | 'compact';

const courses = CourseRowSchema.array().parse([
  { course_id: 1, title: 'CMPUT291', seats_available: 200 },
  { course_id: 2, title: 'CMPUT274', seats_available: 70 },
  { course_id: 3, title: 'CMPUT301', seats_available: 80 }
]);

const students = StudentRowSchema.array().parse([
  { student_id: 11, name: 'John' },
  { student_id: 12, name: 'Mary' },
  { student_id: 13, name: 'Steve' },
  { student_id: 14, name: 'Bob' },
  { student_id: 15, name: 'Seth' },
  { student_id: 16, name: 'Samantha' },
  { student_id: 17, name: 'Emily' },
  { student_id: 18, name: 'Paul' },
  { student_id: 19, name: 'Emma' },
  { student_id: 20, name: 'Ross' }
]);

const takes = TakeRowSchema.array().parse([
  { course_id: 1, student_id: 11, enroll_date: '2017-08-01' },
  { course_id: 2, student_id: 13, enroll_date: '2017-09-01' },
  { course_id: 2, student_id: 14, enroll_date: '2017-08-15' },
  { course_id: 3, student_id: 11, enroll_date: '2017-09-01' },
  { course_id: 3, student_id: 12, enroll_date: '2017-08-15' }
]);

export const SEED_DATASETS: Record<SeedDatasetName, SeedDataset> = {
  full: { courses, students, takes },
  compact: { courses, students: students.slice(0, 4), takes }
};
