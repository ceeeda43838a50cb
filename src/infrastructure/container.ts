import type { EnrollmentConfig } from '../config/index.js';
import type { Clock } from '../domain/enroll-date.js';
import { systemClock } from '../domain/enroll-date.js';
import { EnrollmentApplicationService } from '../application/enrollment-service.js';
import { StudentPaginationService } from '../application/pagination-service.js';
import type { DatabaseHandle } from './database/connection.js';
import {
  SqliteStudentRepository,
  SqliteCourseRepository,
  SqliteTakeRepository,
  SqliteUnitOfWork
} from './repositories/sqlite-repositories.js';

export interface ApplicationServices {
  readonly enrollment: EnrollmentApplicationService;
  readonly pagination: StudentPaginationService;
}

/**
 * 接続ハンドルからリポジトリとサービスを組み立てる
 */
export const createServices = (
  db: DatabaseHandle,
  config: Pick<EnrollmentConfig, 'pagination'>,
  clock: Clock = systemClock
): ApplicationServices => {
  const studentRepository = new SqliteStudentRepository(db);
  const courseRepository = new SqliteCourseRepository(db);
  const takeRepository = new SqliteTakeRepository(db);

  return {
    enrollment: new EnrollmentApplicationService(
      studentRepository,
      courseRepository,
      takeRepository,
      new SqliteUnitOfWork(db),
      clock
    ),
    pagination: new StudentPaginationService(studentRepository, config.pagination)
  };
};
