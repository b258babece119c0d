// Wire envelope types

export type ErrorCode =
  | 'UNKNOWN_TOOL'
  | 'VALIDATION_ERROR'
  | 'AUTH_ERROR'
  | 'NOT_FOUND'
  | 'RULE_NOT_FOUND'
  | 'RULE_STORAGE_ERROR'
  | 'BACKEND_TIMEOUT'
  | 'GMAIL_API_ERROR'
  | 'INTERNAL_ERROR';

export interface Invocation {
  tool_name: string;
  input: Record<string, unknown>;
  session_id: string;
  user_id?: string;
}

export interface ExecutionSuccess {
  tool_result_id: string;
  is_error: false;
  output: Record<string, unknown>;
}

export interface ExecutionFailure {
  tool_result_id: string;
  is_error: true;
  error_code: ErrorCode;
  error_message: string;
}

// Exactly one of output / error_* is ever present
export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

// Mail types (provider-neutral)

export type EmailFormat = 'full' | 'metadata' | 'raw';

export interface MailMessage {
  id: string;
  threadId?: string;
  subject?: string;
  from?: string;
  to: string[];
  snippet?: string;
  date?: string; // ISO 8601
  hasAttachments: boolean;
  labels: string[];
  unread: boolean;
}

export interface MailMessageDetails extends MailMessage {
  internalDate?: string; // epoch millis, as a string
  headers?: { name: string; value: string }[];
  body?: string; // markdown
  raw?: string;
}

export interface MessagePage {
  messages: MailMessage[];
  nextPageToken?: string;
}

export interface ListMessagesParams {
  query?: string;
  maxResults: number;
  pageToken?: string;
}

export type MarkAs = 'read' | 'unread';

export interface MailAccountInfo {
  email?: string;
  provider?: string;
}

// Session types

export interface SessionKey {
  ownerId: string;
  sessionId: string;
}

export interface SessionInteraction {
  tool_result_id: string;
  tool_name: string;
  input: Record<string, unknown>;
  output_summary: Record<string, unknown>;
  at: string;
}

export interface ListEmailsCursor {
  query: string | null;
  page_token: string | null;
  next_page_token: string | null;
}

export interface SessionState {
  interactions: SessionInteraction[];
  list_emails_cursor?: ListEmailsCursor;
}

export interface SessionContext {
  owner_id: string;
  session_id: string;
  state: SessionState;
  updated_at: string;
  expires_at: number; // epoch seconds
}
