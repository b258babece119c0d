import { MailApiError } from '../errors';
import { Logger, silentLogger } from '../logger';
import { retryWithBackoff, withTimeout } from '../util';
import { MailBackend } from './backend';

export interface GuardOptions {
  timeoutMs: number;
  /** Extra attempts for read operations on retryable provider errors. */
  readRetries: number;
  retryDelayMs?: number;
  logger?: Logger;
}

/**
 * Bounds every backend call by a timeout and retries reads on transient
 * provider errors. Mutations run exactly once.
 */
export function guardMailBackend(backend: MailBackend, options: GuardOptions): MailBackend {
  const logger = options.logger ?? silentLogger;
  const baseDelayMs = options.retryDelayMs ?? 500;

  const bounded = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
    withTimeout(fn(), options.timeoutMs, operation);

  const read = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
    retryWithBackoff(() => bounded(operation, fn), {
      attempts: options.readRetries + 1,
      baseDelayMs,
      shouldRetry: error => error instanceof MailApiError && error.retryable,
      onRetry: (error, attempt, waitMs) => {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`${operation} failed (${reason}); retry ${attempt}/${options.readRetries} in ${waitMs}ms`);
      }
    });

  return {
    listMessages: params => read('listMessages', () => backend.listMessages(params)),
    getMessage: (id, format) => read('getMessage', () => backend.getMessage(id, format)),
    verifyConnection: () => read('verifyConnection', () => backend.verifyConnection()),
    trashMessages: ids => bounded('trashMessages', () => backend.trashMessages(ids)),
    modifyLabels: (ids, add, remove) => bounded('modifyLabels', () => backend.modifyLabels(ids, add, remove)),
    markMessages: (ids, markAs) => bounded('markMessages', () => backend.markMessages(ids, markAs)),
    deleteMessagesPermanently: ids => bounded('deleteMessagesPermanently', () => backend.deleteMessagesPermanently(ids))
  };
}
