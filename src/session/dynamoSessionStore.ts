import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand
} from '@aws-sdk/lib-dynamodb';
import { SessionContext, SessionKey, SessionState } from '../types';
import { SessionStateSchema, SessionStore, toEpochSeconds } from './sessionStore';

export interface SessionItemKey {
  user_id: string;
  session_id: string;
}

export interface SessionItem extends SessionItemKey {
  context_data: SessionState;
  last_updated: string;
  ttl: number;
}

/** The three table operations the store needs. */
export interface SessionTable {
  getItem(key: SessionItemKey): Promise<Record<string, unknown> | undefined>;
  putItem(item: SessionItem): Promise<void>;
  deleteItem(key: SessionItemKey): Promise<void>;
}

export function documentClientTable(client: DynamoDBDocumentClient, tableName: string): SessionTable {
  return {
    async getItem(key) {
      const response = await client.send(new GetCommand({ TableName: tableName, Key: { ...key } }));
      return response.Item;
    },
    async putItem(item) {
      await client.send(new PutCommand({ TableName: tableName, Item: { ...item } }));
    },
    async deleteItem(key) {
      await client.send(new DeleteCommand({ TableName: tableName, Key: { ...key } }));
    }
  };
}

export function createDynamoSessionTable(tableName: string, region: string): SessionTable {
  const client = DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
    marshallOptions: { removeUndefinedValues: true }
  });
  return documentClientTable(client, tableName);
}

/**
 * Sessions in a DynamoDB table keyed by `user_id` + `session_id`. The table's
 * `ttl` attribute drives DynamoDB's own expiry; items it has not purged yet
 * are filtered out here.
 */
export class DynamoSessionStore implements SessionStore {
  constructor(
    private table: SessionTable,
    private now: () => Date = () => new Date()
  ) {}

  async get(key: SessionKey): Promise<SessionContext | undefined> {
    const item = await this.table.getItem(this.itemKey(key));
    if (!item) return undefined;

    const ttl = typeof item.ttl === 'number' ? item.ttl : undefined;
    if (ttl !== undefined && ttl <= toEpochSeconds(this.now())) return undefined;

    // Older writers stored context_data as a JSON string
    const raw: unknown = typeof item.context_data === 'string' ? JSON.parse(item.context_data) : item.context_data;
    const parsed = SessionStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Stored session context for ${key.sessionId} is malformed: ${parsed.error.issues[0].message}`);
    }

    return {
      owner_id: key.ownerId,
      session_id: key.sessionId,
      state: parsed.data,
      updated_at: typeof item.last_updated === 'string' ? item.last_updated : '',
      expires_at: ttl ?? 0
    };
  }

  async put(key: SessionKey, state: SessionState, ttlSeconds: number): Promise<SessionContext> {
    const now = this.now();
    const item: SessionItem = {
      ...this.itemKey(key),
      context_data: state,
      last_updated: now.toISOString(),
      ttl: toEpochSeconds(now) + ttlSeconds
    };
    await this.table.putItem(item);
    return {
      owner_id: key.ownerId,
      session_id: key.sessionId,
      state,
      updated_at: item.last_updated,
      expires_at: item.ttl
    };
  }

  async delete(key: SessionKey): Promise<void> {
    await this.table.deleteItem(this.itemKey(key));
  }

  private itemKey(key: SessionKey): SessionItemKey {
    return { user_id: key.ownerId, session_id: key.sessionId };
  }
}
