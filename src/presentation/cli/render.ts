import type { StudentPage } from '../../domain/types.js';

export const PAGE_BORDER = '+---|--------+';

const ID_WIDTH = 3;
const NAME_WIDTH = 8;

// 幅を超える値は切り詰めない
const row = (id: string, name: string): string =>
  `|${id.padEnd(ID_WIDTH)}|${name.padEnd(NAME_WIDTH)}|`;

/**
 * 1ページ分の表。末尾に空行を含む
 */
export const renderStudentPage = (page: StudentPage): string[] => [
  `Page ${page.pageNumber}`,
  PAGE_BORDER,
  row('id', 'name'),
  PAGE_BORDER,
  ...page.students.map((student) => row(String(student.studentId), student.name)),
  PAGE_BORDER,
  ''
];
