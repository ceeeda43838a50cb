import type { Result } from '../../shared/types/index.js';
import { match } from '../../shared/types/index.js';
import type { EnrollmentError } from '../../domain/errors.js';
import type { StudentPage } from '../../domain/types.js';
import type { EnrollmentResponse } from '../../application/dtos.js';
import type { ApplicationServices } from '../../infrastructure/container.js';
import type { PaginationConfig } from '../../config/index.js';
import type { ConsoleIO } from './console-io.js';
import {
  STUDENT_ID_PROMPT,
  COURSE_ID_PROMPT,
  pageSizePrompt,
  promptInteger
} from './prompts.js';
import { renderStudentPage } from './render.js';

export interface CommandContext {
  readonly services: ApplicationServices;
  readonly io: ConsoleIO;
  readonly pagination: PaginationConfig;
}

/**
 * 操作の失敗を `[ERROR] <operation> : <message>` として標準エラー出力へ出す。
 * ログレベルの影響を受けない
 */
const report = (io: ConsoleIO, operation: string, error: EnrollmentError): void => {
  io.error(`[ERROR] ${operation} : ${error.message}`);
};

/**
 * enroll: 学生IDと科目IDを読んで登録する
 */
export const runEnrollCommand = async (
  context: CommandContext
): Promise<Result<EnrollmentResponse, EnrollmentError>> => {
  const { services, io } = context;

  const studentId = await promptInteger(io, STUDENT_ID_PROMPT, 'student id');
  if (!studentId.success) {
    report(io, 'enroll', studentId.error);
    return studentId;
  }

  const courseId = await promptInteger(io, COURSE_ID_PROMPT, 'course id');
  if (!courseId.success) {
    report(io, 'enroll', courseId.error);
    return courseId;
  }

  const result = services.enrollment.enroll(studentId.data, courseId.data);
  match(result, {
    success: (enrolled) =>
      io.writeLine(`Student ${enrolled.studentId} successfully enrolled in course ${enrolled.courseId}`),
    error: (error) => report(io, 'enroll', error)
  });
  return result;
};

/**
 * paginate: ページサイズを読んで学生一覧をページごとに表示する
 */
export const runPaginateCommand = async (
  context: CommandContext
): Promise<Result<StudentPage[], EnrollmentError>> => {
  const { services, io, pagination } = context;

  const pageSize = await promptInteger(
    io,
    pageSizePrompt(pagination.minPageSize, pagination.maxPageSize),
    'page size'
  );
  if (!pageSize.success) {
    report(io, 'paginate', pageSize.error);
    return pageSize;
  }

  const result = services.pagination.paginate(pageSize.data, (page) => {
    for (const line of renderStudentPage(page)) {
      io.writeLine(line);
    }
  });
  if (!result.success) {
    report(io, 'paginate', result.error);
  }
  return result;
};
