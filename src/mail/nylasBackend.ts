import Nylas, {
  ListMessagesQueryParams,
  Message,
  MessageFields,
  NylasSdkTimeoutError,
  UpdateMessageRequest
} from 'nylas';
import { FolderDirectory } from '../folderManager';
import {
  BackendTimeoutError,
  MailApiError,
  MailAuthError,
  MessageNotFoundError
} from '../errors';
import { Logger } from '../logger';
import {
  EmailFormat,
  ListMessagesParams,
  MailAccountInfo,
  MailMessage,
  MailMessageDetails,
  MarkAs,
  MessagePage
} from '../types';
import { chunk, encodeNative, htmlToMarkdown } from '../util';
import { MailBackend } from './backend';

const BATCH_SIZE = 8;
const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE']);

// Gmail system labels that Nylas exposes as message flags rather than folders
const FLAG_LABELS = {
  UNREAD: 'unread',
  STARRED: 'starred'
} as const;

type FlagField = (typeof FLAG_LABELS)[keyof typeof FLAG_LABELS];

function flagFieldOf(name: string): FlagField | undefined {
  const upper = name.toUpperCase();
  if (upper === 'UNREAD' || upper === 'STARRED') return FLAG_LABELS[upper];
  return undefined;
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function networkCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Translates whatever the Nylas SDK (or the transport under it) threw into
 * the backend's domain errors. Domain errors and unrecognised errors pass
 * through unchanged.
 */
export function translateNylasError(error: unknown, operation: string): unknown {
  if (
    error instanceof MailAuthError ||
    error instanceof MailApiError ||
    error instanceof MessageNotFoundError ||
    error instanceof BackendTimeoutError
  ) {
    return error;
  }
  if (error instanceof NylasSdkTimeoutError) {
    return new BackendTimeoutError(operation, error.timeout);
  }

  const message = error instanceof Error ? error.message : String(error);
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    if (statusCode === 401 || statusCode === 403) {
      return new MailAuthError(`Mail provider rejected the credentials: ${message}`, statusCode);
    }
    if (statusCode === 404) {
      return new MessageNotFoundError(`${operation}: ${message}`);
    }
    const retryable = statusCode === 429 || statusCode >= 500;
    return new MailApiError(message, statusCode, retryable);
  }

  const networkCode = networkCodeOf(error);
  if (networkCode && TRANSIENT_NETWORK_CODES.has(networkCode)) {
    return new MailApiError(`Network error talking to the mail provider (${networkCode}): ${message}`, undefined, true);
  }
  return error;
}

function formatAddress(entry: { email: string; name?: string }): string {
  return entry.name ? `${entry.name} <${entry.email}>` : entry.email;
}

export class NylasMailBackend implements MailBackend {
  private folders: FolderDirectory;

  constructor(
    private nylas: Nylas,
    private grantId: string,
    private logger: Logger
  ) {
    this.folders = new FolderDirectory(nylas, grantId);
  }

  async listMessages(params: ListMessagesParams): Promise<MessagePage> {
    return this.call('listMessages', async () => {
      const queryParams: ListMessagesQueryParams = { limit: params.maxResults };
      if (params.query) queryParams.searchQueryNative = encodeNative(params.query);
      if (params.pageToken) queryParams.pageToken = params.pageToken;

      const response = await this.nylas.messages.list({ identifier: this.grantId, queryParams });
      const labelNames = await this.folders.namesById();
      return {
        messages: response.data.map(m => this.toMailMessage(m, labelNames)),
        nextPageToken: response.nextCursor || undefined
      };
    });
  }

  async getMessage(messageId: string, format: EmailFormat): Promise<MailMessageDetails> {
    return this.call('getMessage', async () => {
      const fields = format === 'raw' ? MessageFields.RAW_MIME
        : format === 'full' ? MessageFields.INCLUDE_HEADERS
        : MessageFields.STANDARD;
      const response = await this.nylas.messages.find({
        identifier: this.grantId,
        messageId,
        queryParams: { fields }
      });
      const message = response.data;
      const labelNames = await this.folders.namesById();

      const details: MailMessageDetails = {
        ...this.toMailMessage(message, labelNames),
        internalDate: message.date ? String(message.date * 1000) : undefined
      };
      if (format === 'full') {
        details.headers = message.headers?.map(h => ({ name: h.name, value: h.value }));
        if (message.body) details.body = htmlToMarkdown(message.body);
      }
      if (format === 'raw') {
        details.raw = message.rawMime;
      }
      return details;
    });
  }

  async trashMessages(messageIds: string[]): Promise<void> {
    const trashId = await this.call('trashMessages', () => this.folders.trashFolderId());
    await this.forEachMessage('trashMessages', messageIds, id => this.update(id, { folders: [trashId] }));
  }

  async modifyLabels(messageIds: string[], addLabels: string[], removeLabels: string[]): Promise<void> {
    await this.call('modifyLabels', async () => {
      const flagUpdate: UpdateMessageRequest = {};
      const addIds: string[] = [];
      const removeIds: string[] = [];

      for (const name of addLabels) {
        const flag = flagFieldOf(name);
        if (flag) flagUpdate[flag] = true;
        else addIds.push((await this.folders.getOrCreate(name)).id);
      }
      for (const name of removeLabels) {
        const flag = flagFieldOf(name);
        if (flag) {
          flagUpdate[flag] = false;
          continue;
        }
        const folder = await this.folders.findByName(name);
        if (folder) removeIds.push(folder.id);
        else this.logger.debug(`Label "${name}" does not exist; nothing to remove`);
      }

      await this.forEachMessage('modifyLabels', messageIds, async id => {
        const body: UpdateMessageRequest = { ...flagUpdate };
        if (addIds.length > 0 || removeIds.length > 0) {
          const current = (await this.nylas.messages.find({ identifier: this.grantId, messageId: id })).data.folders ?? [];
          const folderSet = new Set(current);
          addIds.forEach(fid => folderSet.add(fid));
          removeIds.forEach(fid => folderSet.delete(fid));
          if (current.length > 0 && folderSet.size === 0) {
            throw new MailApiError(`Update for message ${id} would leave it without any labels.`);
          }
          if (folderSet.size !== current.length || !current.every(fid => folderSet.has(fid))) {
            body.folders = Array.from(folderSet);
          }
        }
        if (Object.keys(body).length === 0) {
          this.logger.debug(`Skipping no-op label update for message ${id}`);
          return;
        }
        await this.update(id, body);
      });
    });
  }

  async markMessages(messageIds: string[], markAs: MarkAs): Promise<void> {
    await this.forEachMessage('markMessages', messageIds, id => this.update(id, { unread: markAs === 'unread' }));
  }

  async deleteMessagesPermanently(messageIds: string[]): Promise<void> {
    await this.forEachMessage('deleteMessagesPermanently', messageIds, async id => {
      await this.nylas.messages.destroy({ identifier: this.grantId, messageId: id });
    });
  }

  async verifyConnection(): Promise<MailAccountInfo> {
    return this.call('verifyConnection', async () => {
      const grant = await this.nylas.grants.find({ grantId: this.grantId });
      return { email: grant.data.email, provider: grant.data.provider };
    });
  }

  private async update(messageId: string, requestBody: UpdateMessageRequest): Promise<void> {
    await this.nylas.messages.update({ identifier: this.grantId, messageId, requestBody });
  }

  /**
   * Runs `op` for every id in batches of BATCH_SIZE. Every id is attempted;
   * the first failure (in id order) is rethrown afterwards.
   */
  private async forEachMessage(operation: string, messageIds: string[], op: (id: string) => Promise<void>): Promise<void> {
    const failures: { id: string; error: unknown }[] = [];

    for (const batch of chunk(messageIds, BATCH_SIZE)) {
      const results = await Promise.allSettled(batch.map(id => op(id)));
      results.forEach((result, index) => {
        if (result.status === 'rejected') failures.push({ id: batch[index], error: result.reason });
      });
    }

    if (failures.length > 0) {
      this.logger.warn(
        `${operation}: ${messageIds.length - failures.length}/${messageIds.length} succeeded. Failed: ` +
        failures.map(f => f.id).join(', ')
      );
      throw translateNylasError(failures[0].error, operation);
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw translateNylasError(error, operation);
    }
  }

  private toMailMessage(message: Message, labelNames: Map<string, string>): MailMessage {
    const folders = message.folders ?? [];
    const labels = folders.map(id => labelNames.get(id) ?? id);
    if (message.unread && !labels.includes('UNREAD')) labels.push('UNREAD');
    if (message.starred && !labels.includes('STARRED')) labels.push('STARRED');

    return {
      id: message.id,
      threadId: message.threadId,
      subject: message.subject,
      from: message.from?.[0] ? formatAddress(message.from[0]) : undefined,
      to: (message.to ?? []).map(formatAddress),
      snippet: message.snippet,
      date: message.date ? new Date(message.date * 1000).toISOString() : undefined,
      hasAttachments: (message.attachments ?? []).length > 0,
      labels,
      unread: message.unread === true
    };
  }
}
