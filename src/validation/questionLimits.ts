import { AppError } from '../errors/index.js';

/**
 * Limits configuration for question validation.
 */
export interface QuestionLimits {
  minChars: number;
  maxChars: number;
}

/**
 * Trims a question and enforces the length limits.
 * Runs in the transport layer, before anything reaches the advisor.
 *
 * @returns The trimmed question
 * @throws AppError (400) when too short, (413) when too long
 */
export function enforceQuestionLimits(question: string, limits: QuestionLimits): string {
  const trimmed = question.trim();

  if (trimmed.length < limits.minChars) {
    throw AppError.questionTooShort(limits.minChars, trimmed.length);
  }

  if (trimmed.length > limits.maxChars) {
    throw AppError.questionTooLong(limits.maxChars, trimmed.length);
  }

  return trimmed;
}
