/**
 * 共通型 - 統合エクスポート
 */

// === Result型とその基本操作 ===
export {
  type Result,
  Ok,
  Err,
  map,
  flatMap,
  mapError,
  match,
  parseWith,
  from
} from './result.js';

// === ブランド型 ===
export {
  type StudentId,
  type CourseId,
  StudentIdSchema,
  CourseIdSchema,
  IntegerInputSchema
} from './brand-types.js';
