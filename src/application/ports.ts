import type { Result } from '../shared/types/index.js';
import type { EnrollmentError } from '../domain/errors.js';
import type {
  StudentId,
  CourseId,
  Student,
  Take
} from '../domain/types.js';

/**
 * ポート＆アダプタパターン
 *
 * better-sqlite3 は同期APIなので、ポートも同期でResultを返す
 */

export interface IStudentRepository {
  /**
   * 学生の存在確認
   */
  exists(studentId: StudentId): Result<boolean, EnrollmentError>;

  /**
   * `afterId` より大きい student_id を昇順に最大 `limit` 件
   */
  findPageAfter(afterId: number, limit: number): Result<Student[], EnrollmentError>;
}

export interface ICourseRepository {
  exists(courseId: CourseId): Result<boolean, EnrollmentError>;

  /**
   * 空席（seats_available > 0）があるか
   */
  hasSeatsAvailable(courseId: CourseId): Result<boolean, EnrollmentError>;

  /**
   * 空席を1つ減らす。空席がなければ BusinessRuleError(COURSE_FULL)
   */
  decrementSeats(courseId: CourseId): Result<void, EnrollmentError>;
}

export interface ITakeRepository {
  isEnrolled(studentId: StudentId, courseId: CourseId): Result<boolean, EnrollmentError>;

  save(take: Take): Result<void, EnrollmentError>;
}

/**
 * トランザクション境界
 *
 * `work` がErrを返すか例外を投げた場合はロールバックする
 */
export interface IUnitOfWork {
  run<T>(work: () => Result<T, EnrollmentError>): Result<T, EnrollmentError>;
}
