import type { Result } from '../shared/types/index.js';
import { Ok, Err, flatMap, map, parseWith } from '../shared/types/index.js';
import type { EnrollmentError } from '../domain/errors.js';
import {
  createNotFoundError,
  courseFullError,
  alreadyEnrolledError
} from '../domain/errors.js';
import type { StudentId, CourseId, Take } from '../domain/types.js';
import type { Clock } from '../domain/enroll-date.js';
import { formatEnrollDate, systemClock } from '../domain/enroll-date.js';

import type {
  IStudentRepository,
  ICourseRepository,
  ITakeRepository,
  IUnitOfWork
} from './ports.js';

import type { EnrollmentResponse } from './dtos.js';
import {
  EnrollCommandSchema,
  mapCommandError,
  mapTakeToResponse
} from './dtos.js';

/**
 * 問い合わせ結果が期待どおりでなければ `failure` を返す
 */
const ensure = (
  check: Result<boolean, EnrollmentError>,
  expected: boolean,
  failure: () => EnrollmentError
): Result<void, EnrollmentError> =>
  flatMap(check, (actual): Result<void, EnrollmentError> =>
    actual === expected ? Ok(undefined) : Err(failure())
  );

/**
 * 履修登録ユースケース
 */
export class EnrollmentApplicationService {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly courseRepository: ICourseRepository,
    private readonly takeRepository: ITakeRepository,
    private readonly unitOfWork: IUnitOfWork,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * 学生を科目に登録する
   *
   * フロー:
   * 1. 入力検証
   * 2. 学生の存在確認
   * 3. 科目の存在確認
   * 4. 空席確認
   * 5. 重複チェック
   * 6. take 追加 → 空席を1減らす（同一トランザクション）
   */
  enroll(studentId: number, courseId: number): Result<EnrollmentResponse, EnrollmentError> {
    const command = parseWith(EnrollCommandSchema, { studentId, courseId }, mapCommandError);

    return flatMap(command, (valid) =>
      flatMap(this.validate(valid.studentId, valid.courseId), () =>
        this.record({
          studentId: valid.studentId,
          courseId: valid.courseId,
          enrollDate: formatEnrollDate(this.clock())
        })
      )
    );
  }

  /**
   * 登録前の検証。この順で最初に失敗したものを返す
   */
  private validate(studentId: StudentId, courseId: CourseId): Result<void, EnrollmentError> {
    return flatMap(
      ensure(this.studentRepository.exists(studentId), true, () =>
        createNotFoundError('student', studentId)
      ),
      () => flatMap(
        ensure(this.courseRepository.exists(courseId), true, () =>
          createNotFoundError('course', courseId)
        ),
        () => flatMap(
          ensure(this.courseRepository.hasSeatsAvailable(courseId), true, () =>
            courseFullError(courseId)
          ),
          () => ensure(this.takeRepository.isEnrolled(studentId, courseId), false, () =>
            alreadyEnrolledError(studentId, courseId)
          )
        )
      )
    );
  }

  private record(take: Take): Result<EnrollmentResponse, EnrollmentError> {
    const written = this.unitOfWork.run(() =>
      flatMap(this.takeRepository.save(take), () =>
        this.courseRepository.decrementSeats(take.courseId)
      )
    );
    return map(written, () => mapTakeToResponse(take));
  }
}
