import Nylas from 'nylas';
import { AppConfig } from '../config';
import { MailAuthError } from '../errors';
import { Logger } from '../logger';
import { MailBackend } from './backend';
import { guardMailBackend } from './guarded';
import { NylasMailBackend } from './nylasBackend';

/**
 * Builds the Nylas-backed mailbox for the configured grant and checks the
 * grant is reachable before handing it out.
 */
export async function createNylasMailBackend(config: AppConfig, logger: Logger): Promise<MailBackend> {
  const { apiKey, grantId, apiUri } = config.nylas;
  if (!apiKey || !grantId) {
    throw new MailAuthError('Mail backend credentials are not configured (NYLAS_API_KEY and NYLAS_GRANT_ID are required).');
  }

  const nylas = new Nylas({
    apiKey,
    apiUri,
    timeout: Math.ceil(config.requestTimeoutMs / 1000)
  });

  const backend = guardMailBackend(new NylasMailBackend(nylas, grantId, logger.child('nylas')), {
    timeoutMs: config.requestTimeoutMs,
    readRetries: config.readRetries,
    logger
  });

  const account = await backend.verifyConnection();
  logger.info(`Connected to mailbox ${account.email ?? grantId} (${account.provider ?? 'unknown provider'})`);
  return backend;
}
