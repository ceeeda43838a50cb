import type { Result } from '../../shared/types/index.js';
import { Err, IntegerInputSchema, parseWith } from '../../shared/types/index.js';
import type { EnrollmentError } from '../../domain/errors.js';
import { createValidationError } from '../../domain/errors.js';
import type { ConsoleIO } from './console-io.js';

export const STUDENT_ID_PROMPT = 'Please enter student id: ';
export const COURSE_ID_PROMPT = 'Please enter course id: ';

export const pageSizePrompt = (min: number, max: number): string =>
  `Enter page size (an integer in [${min},${max}]): `;

/**
 * 整数を1つ読む
 */
export const promptInteger = async (
  io: ConsoleIO,
  prompt: string,
  field: string
): Promise<Result<number, EnrollmentError>> => {
  const answer = await io.ask(prompt);
  if (answer === null) {
    return Err(createValidationError(`no input for ${field}`, 'NO_INPUT', field));
  }

  return parseWith(IntegerInputSchema, answer, () =>
    createValidationError(`invalid ${field} '${answer.trim()}'`, 'INVALID_INPUT', field, answer)
  );
};
