import {
  EmailFormat,
  ListMessagesParams,
  MailAccountInfo,
  MailMessageDetails,
  MarkAs,
  MessagePage
} from '../types';

/**
 * Mailbox operations the tools run against. Implementations throw the domain
 * errors from `../errors` (MailAuthError, MailApiError, MessageNotFoundError,
 * BackendTimeoutError); anything else is treated as an internal fault.
 */
export interface MailBackend {
  listMessages(params: ListMessagesParams): Promise<MessagePage>;
  getMessage(messageId: string, format: EmailFormat): Promise<MailMessageDetails>;
  trashMessages(messageIds: string[]): Promise<void>;
  modifyLabels(messageIds: string[], addLabels: string[], removeLabels: string[]): Promise<void>;
  markMessages(messageIds: string[], markAs: MarkAs): Promise<void>;
  /** Irreversible. */
  deleteMessagesPermanently(messageIds: string[]): Promise<void>;
  verifyConnection(): Promise<MailAccountInfo>;
}
