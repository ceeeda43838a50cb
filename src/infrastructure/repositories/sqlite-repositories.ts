import type { Result } from '../../shared/types/index.js';
import { Ok, Err } from '../../shared/types/index.js';
import type { EnrollmentError } from '../../domain/errors.js';
import { courseFullError, storeFailure } from '../../domain/errors.js';
import type {
  StudentId,
  CourseId,
  Student,
  Take
} from '../../domain/types.js';
import { StudentSchema } from '../../domain/types.js';
import type {
  IStudentRepository,
  ICourseRepository,
  ITakeRepository,
  IUnitOfWork
} from '../../application/ports.js';
import type { DatabaseHandle } from '../database/connection.js';

/**
 * SQLiteリポジトリ実装
 *
 * better-sqlite3 の例外はここで StoreError に変換し、上位には投げない
 */

const guard = <T>(operation: string, fn: () => T): Result<T, EnrollmentError> => {
  try {
    return Ok(fn());
  } catch (error) {
    return storeFailure(operation, error);
  }
};

export class SqliteStudentRepository implements IStudentRepository {
  constructor(private readonly db: DatabaseHandle) {}

  exists(studentId: StudentId): Result<boolean, EnrollmentError> {
    return guard('studentExists', () =>
      this.db
        .prepare('SELECT student_id FROM student WHERE student_id = ?')
        .get(studentId) !== undefined
    );
  }

  findPageAfter(afterId: number, limit: number): Result<Student[], EnrollmentError> {
    return guard('findPageAfter', () => {
      const rows = this.db
        .prepare('SELECT student_id, name FROM student WHERE student_id > ? ORDER BY student_id ASC LIMIT ?')
        .all(afterId, limit);
      return StudentSchema.array().parse(rows);
    });
  }
}

export class SqliteCourseRepository implements ICourseRepository {
  constructor(private readonly db: DatabaseHandle) {}

  exists(courseId: CourseId): Result<boolean, EnrollmentError> {
    return guard('courseExists', () =>
      this.db
        .prepare('SELECT course_id FROM course WHERE course_id = ?')
        .get(courseId) !== undefined
    );
  }

  hasSeatsAvailable(courseId: CourseId): Result<boolean, EnrollmentError> {
    return guard('isSeatsAvailable', () =>
      this.db
        .prepare('SELECT course_id FROM course WHERE course_id = ? AND seats_available > 0')
        .get(courseId) !== undefined
    );
  }

  decrementSeats(courseId: CourseId): Result<void, EnrollmentError> {
    const result = guard('decrementSeats', () =>
      this.db
        .prepare('UPDATE course SET seats_available = seats_available - 1 WHERE course_id = ? AND seats_available > 0')
        .run(courseId)
        .changes
    );
    if (!result.success) {
      return result;
    }
    return result.data === 0 ? Err(courseFullError(courseId)) : Ok(undefined);
  }
}

export class SqliteTakeRepository implements ITakeRepository {
  constructor(private readonly db: DatabaseHandle) {}

  isEnrolled(studentId: StudentId, courseId: CourseId): Result<boolean, EnrollmentError> {
    return guard('isCurrentlyEnrolled', () =>
      this.db
        .prepare('SELECT student_id FROM take WHERE student_id = ? AND course_id = ?')
        .get(studentId, courseId) !== undefined
    );
  }

  save(take: Take): Result<void, EnrollmentError> {
    return guard('insertTake', () => {
      this.db
        .prepare('INSERT INTO take (course_id, student_id, enroll_date) VALUES (?, ?, ?)')
        .run(take.courseId, take.studentId, take.enrollDate);
    });
  }
}

/**
 * `work` の Err をロールバックの合図として運ぶ
 */
class RollbackSignal extends Error {
  constructor(readonly reason: EnrollmentError) {
    super(reason.message);
    this.name = 'RollbackSignal';
  }
}

export class SqliteUnitOfWork implements IUnitOfWork {
  constructor(private readonly db: DatabaseHandle) {}

  run<T>(work: () => Result<T, EnrollmentError>): Result<T, EnrollmentError> {
    try {
      const transaction = this.db.transaction((): T => {
        const result = work();
        if (!result.success) {
          throw new RollbackSignal(result.error);
        }
        return result.data;
      });
      return Ok(transaction());
    } catch (error) {
      if (error instanceof RollbackSignal) {
        return Err(error.reason);
      }
      return storeFailure('transaction', error);
    }
  }
}

