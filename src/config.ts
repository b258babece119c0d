import { z } from 'zod';
import { ConfigError } from './errors';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8892),
  DAMIEN_MCP_SERVER_API_KEY: z.string().default(''),
  DAMIEN_LOG_LEVEL: z.string().toLowerCase().pipe(LogLevelSchema).default('info'),
  DAMIEN_DEFAULT_USER_ID: z.string().min(1).default('damien_default_user'),
  DAMIEN_REQUEST_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  DAMIEN_READ_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  DAMIEN_RULES_FILE: z.string().min(1).default('./data/rules.json'),
  DAMIEN_APPLY_RULES_SCAN_LIMIT: z.coerce.number().int().positive().default(500),
  DAMIEN_SESSION_STORE: z.enum(['memory', 'dynamodb']).default('memory'),
  DAMIEN_DYNAMODB_SESSION_TABLE_NAME: z.string().min(1).default('DamienMCPSessions'),
  DAMIEN_DYNAMODB_REGION: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).optional(),
  DAMIEN_DYNAMODB_SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  NYLAS_API_KEY: z.string().optional(),
  NYLAS_GRANT_ID: z.string().optional(),
  NYLAS_API_URI: z.string().url().optional()
});

export interface AppConfig {
  port: number;
  apiKey: string;
  logLevel: z.infer<typeof LogLevelSchema>;
  defaultUserId: string;
  requestTimeoutMs: number;
  readRetries: number;
  rulesFile: string;
  applyRulesScanLimit: number;
  session: {
    store: 'memory' | 'dynamodb';
    tableName: string;
    region: string;
    ttlSeconds: number;
  };
  nylas: {
    apiKey?: string;
    grantId?: string;
    apiUri?: string;
  };
}

// Empty strings from .env files mean "unset"
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    apiKey: e.DAMIEN_MCP_SERVER_API_KEY,
    logLevel: e.DAMIEN_LOG_LEVEL,
    defaultUserId: e.DAMIEN_DEFAULT_USER_ID,
    requestTimeoutMs: e.DAMIEN_REQUEST_TIMEOUT_SECONDS * 1000,
    readRetries: e.DAMIEN_READ_RETRIES,
    rulesFile: e.DAMIEN_RULES_FILE,
    applyRulesScanLimit: e.DAMIEN_APPLY_RULES_SCAN_LIMIT,
    session: {
      store: e.DAMIEN_SESSION_STORE,
      tableName: e.DAMIEN_DYNAMODB_SESSION_TABLE_NAME,
      region: e.DAMIEN_DYNAMODB_REGION ?? e.AWS_REGION ?? 'us-east-1',
      ttlSeconds: e.DAMIEN_DYNAMODB_SESSION_TTL_SECONDS
    },
    nylas: {
      apiKey: e.NYLAS_API_KEY,
      grantId: e.NYLAS_GRANT_ID,
      apiUri: e.NYLAS_API_URI
    }
  };
}
