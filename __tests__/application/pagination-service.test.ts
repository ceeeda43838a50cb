import { describe, test, expect, afterEach } from 'vitest';
import { StudentPaginationService } from '../../src/application/pagination-service.js';
import { SqliteStudentRepository } from '../../src/infrastructure/repositories/sqlite-repositories.js';
import { SEED_DATASETS } from '../../src/infrastructure/database/seed-data.js';
import type { DatabaseHandle } from '../../src/infrastructure/database/connection.js';
import type { StudentPage } from '../../src/domain/types.js';
import { openTestDatabase, buildDataset } from '../helpers/database.js';

const idsOf = (pages: readonly StudentPage[]): number[][] =>
  pages.map((page) => page.students.map((student) => student.studentId));

describe('StudentPaginationService', () => {
  let db: DatabaseHandle;

  const serviceFor = (handle: DatabaseHandle): StudentPaginationService => {
    db = handle;
    return new StudentPaginationService(new SqliteStudentRepository(handle));
  };

  afterEach(() => {
    if (db.open) {
      db.close();
    }
  });

  describe('validatePageSize', () => {
    test.each([0, 6, -1, 2.5])('%s は範囲外', (size) => {
      const service = serviceFor(openTestDatabase());

      const result = service.validatePageSize(size);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('PAGE_SIZE_OUT_OF_RANGE');
        expect(result.error.message).toBe('page size must be in range [1,5]');
      }
    });

    test.each([1, 5])('%s は受け付ける', (size) => {
      const service = serviceFor(openTestDatabase());

      expect(service.validatePageSize(size)).toEqual({ success: true, data: size });
    });

    test('範囲は設定で変えられる', () => {
      const handle = openTestDatabase();
      db = handle;
      const service = new StudentPaginationService(new SqliteStudentRepository(handle), {
        minPageSize: 2,
        maxPageSize: 3
      });

      const result = service.validatePageSize(1);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('page size must be in range [2,3]');
      }
    });
  });

  describe('paginate', () => {
    test('10人をページサイズ4で取得すると 4, 4, 2', () => {
      const service = serviceFor(openTestDatabase(SEED_DATASETS.full));

      const result = service.paginate(4);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(idsOf(result.data)).toEqual([
          [11, 12, 13, 14],
          [15, 16, 17, 18],
          [19, 20]
        ]);
        expect(result.data.map((page) => page.pageNumber)).toEqual([1, 2, 3]);
        expect(result.data.map((page) => page.lastId)).toEqual([14, 18, 20]);
      }
    });

    test('最終ページの次は null', () => {
      const service = serviceFor(openTestDatabase(SEED_DATASETS.full));
      const pageSize = service.validatePageSize(4);
      expect(pageSize.success).toBe(true);

      if (pageSize.success) {
        expect(service.fetchPage(20, pageSize.data, 4)).toEqual({ success: true, data: null });
      }
    });

    test.each([1, 2, 3, 4, 5])('ページサイズ %s でも全員を順に一度ずつ返す', (size) => {
      const service = serviceFor(openTestDatabase(SEED_DATASETS.full));

      const result = service.paginate(size);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toHaveLength(Math.ceil(10 / size));
        expect(idsOf(result.data).flat()).toEqual([11, 12, 13, 14, 15, 16, 17, 18, 19, 20]);
      }
    });

    test('ページごとにコールバックが呼ばれる', () => {
      const service = serviceFor(openTestDatabase(SEED_DATASETS.compact));
      const seen: number[] = [];

      service.paginate(3, (page) => seen.push(page.pageNumber));

      expect(seen).toEqual([1, 2]);
    });

    test('学生がいなければページなし', () => {
      const service = serviceFor(openTestDatabase());

      expect(service.paginate(3)).toEqual({ success: true, data: [] });
    });

    test('IDが連続していなくても取りこぼさない', () => {
      const service = serviceFor(
        openTestDatabase(
          buildDataset({
            students: [
              { student_id: 50, name: 'Paul' },
              { student_id: 3, name: 'Emma' },
              { student_id: 7, name: 'Ross' }
            ]
          })
        )
      );

      const result = service.paginate(2);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(idsOf(result.data)).toEqual([[3, 7], [50]]);
      }
    });

    test('範囲外のページサイズでは問い合わせない', () => {
      const service = serviceFor(openTestDatabase(SEED_DATASETS.full));
      const seen: number[] = [];

      const result = service.paginate(6, (page) => seen.push(page.pageNumber));

      expect(result.success).toBe(false);
      expect(seen).toEqual([]);
    });

    test('閉じた接続では StoreError', () => {
      const service = serviceFor(openTestDatabase(SEED_DATASETS.full));
      db.close();

      const result = service.paginate(2);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('StoreError');
      }
    });
  });
});
