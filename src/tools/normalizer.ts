import {
  BackendTimeoutError,
  MailApiError,
  MailAuthError,
  MessageNotFoundError,
  RuleNotFoundError,
  RuleStorageError,
  ValidationError
} from '../errors';
import { ErrorCode } from '../types';

export const INTERNAL_ERROR_MESSAGE = 'An internal error occurred while executing the tool.';

/** A failure, classified once at the point it is caught. */
export type Failure =
  | { kind: 'unknown_tool'; toolName: string }
  | { kind: 'validation'; message: string }
  | { kind: 'auth'; message: string }
  | { kind: 'not_found'; message: string }
  | { kind: 'rule_not_found'; message: string }
  | { kind: 'rule_storage'; message: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'upstream'; message: string; statusCode?: number }
  | { kind: 'internal'; error: unknown };

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export function classifyFailure(error: unknown): Failure {
  if (error instanceof ValidationError) return { kind: 'validation', message: error.message };
  if (error instanceof MailAuthError) return { kind: 'auth', message: error.message };
  if (error instanceof MessageNotFoundError) return { kind: 'not_found', message: error.message };
  if (error instanceof RuleNotFoundError) return { kind: 'rule_not_found', message: error.message };
  if (error instanceof RuleStorageError) return { kind: 'rule_storage', message: error.message };
  if (error instanceof BackendTimeoutError) return { kind: 'timeout', message: error.message };
  if (error instanceof MailApiError) return { kind: 'upstream', message: error.message, statusCode: error.statusCode };
  return { kind: 'internal', error };
}

/** Resolves a promise into an Outcome; never rejects. */
export async function settle<T>(promise: Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, failure: classifyFailure(error) };
  }
}

export interface ErrorBody {
  error_code: ErrorCode;
  error_message: string;
}

export function toErrorBody(failure: Failure): ErrorBody {
  switch (failure.kind) {
    case 'unknown_tool':
      return { error_code: 'UNKNOWN_TOOL', error_message: `Tool '${failure.toolName}' is not registered.` };
    case 'validation':
      return { error_code: 'VALIDATION_ERROR', error_message: failure.message };
    case 'auth':
      return { error_code: 'AUTH_ERROR', error_message: failure.message };
    case 'not_found':
      return { error_code: 'NOT_FOUND', error_message: failure.message };
    case 'rule_not_found':
      return { error_code: 'RULE_NOT_FOUND', error_message: failure.message };
    case 'rule_storage':
      return { error_code: 'RULE_STORAGE_ERROR', error_message: failure.message };
    case 'timeout':
      return { error_code: 'BACKEND_TIMEOUT', error_message: failure.message };
    case 'upstream':
      return { error_code: 'GMAIL_API_ERROR', error_message: failure.message };
    case 'internal':
      return { error_code: 'INTERNAL_ERROR', error_message: INTERNAL_ERROR_MESSAGE };
    default: {
      const unreachable: never = failure;
      return unreachable;
    }
  }
}
