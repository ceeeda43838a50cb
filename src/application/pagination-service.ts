import { z } from 'zod';
import type { Result } from '../shared/types/index.js';
import { Ok, parseWith } from '../shared/types/index.js';
import type { EnrollmentError } from '../domain/errors.js';
import { createValidationError } from '../domain/errors.js';
import type { StudentPage } from '../domain/types.js';
import type { PaginationConfig } from '../config/index.js';
import type { IStudentRepository } from './ports.js';

export type PageSize = number & z.BRAND<'PageSize'>;

/**
 * 学生一覧のキーセットページング
 *
 * `student_id > lastId ORDER BY student_id LIMIT pageSize` を空ページが返るまで繰り返す
 */
export class StudentPaginationService {
  private readonly pageSizeSchema: z.ZodType<PageSize, z.ZodTypeDef, unknown>;

  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly bounds: PaginationConfig = { minPageSize: 1, maxPageSize: 5 }
  ) {
    this.pageSizeSchema = z.number()
      .int()
      .min(bounds.minPageSize)
      .max(bounds.maxPageSize)
      .brand<'PageSize'>();
  }

  /**
   * ページサイズが [min, max] の整数か
   */
  validatePageSize(pageSize: number): Result<PageSize, EnrollmentError> {
    const { minPageSize, maxPageSize } = this.bounds;
    return parseWith(this.pageSizeSchema, pageSize, () =>
      createValidationError(
        `page size must be in range [${minPageSize},${maxPageSize}]`,
        'PAGE_SIZE_OUT_OF_RANGE',
        'pageSize',
        pageSize
      )
    );
  }

  /**
   * カーソル `lastId` の次のページ。最終ページの次は null
   */
  fetchPage(
    lastId: number,
    pageSize: PageSize,
    pageNumber: number
  ): Result<StudentPage | null, EnrollmentError> {
    const studentsResult = this.studentRepository.findPageAfter(lastId, pageSize);
    if (!studentsResult.success) {
      return studentsResult;
    }

    const students = studentsResult.data;
    const last = students[students.length - 1];
    if (last === undefined) {
      return Ok(null);
    }
    return Ok({ pageNumber, students, lastId: last.studentId });
  }

  /**
   * 全ページを順に取得し、取得するたびに `onPage` を呼ぶ
   */
  paginate(
    pageSize: number,
    onPage: (page: StudentPage) => void = () => undefined
  ): Result<StudentPage[], EnrollmentError> {
    const validated = this.validatePageSize(pageSize);
    if (!validated.success) {
      return validated;
    }

    const pages: StudentPage[] = [];
    let lastId = 0;

    for (;;) {
      const pageResult = this.fetchPage(lastId, validated.data, pages.length + 1);
      if (!pageResult.success) {
        return pageResult;
      }

      const page = pageResult.data;
      if (page === null) {
        return Ok(pages);
      }

      onPage(page);
      pages.push(page);
      lastId = page.lastId;
    }
  }
}
