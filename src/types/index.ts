/**
 * @fileoverview Shared application types.
 */

export { AppErrorCode, CodedError, describeError, isAppError, normalizeError } from './app-errors';
export type { AppError } from './app-errors';
