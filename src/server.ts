import { createHash, timingSafeEqual } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Logger, describeError } from './logger';
import { MailBackendProvider } from './mail/provider';
import { INTERNAL_ERROR_MESSAGE, classifyFailure, toErrorBody } from './tools/normalizer';
import { ToolDispatcher } from './tools/dispatcher';
import { ToolRegistry } from './tools/registry';
import { toValidationIssues } from './tools/validator';
import { ExecutionFailure } from './types';

export const SERVICE_NAME = 'damien-mcp-server';
export const SERVICE_VERSION = '0.1.0';

const BODY_LIMIT = '1mb';

export interface AppDeps {
  apiKey: string;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  mail: MailBackendProvider;
  logger: Logger;
}

const InvocationEnvelope = z.object({
  tool_name: z.string().min(1),
  input: z.record(z.unknown()).default({}),
  session_id: z.string().min(1),
  user_id: z.string().min(1).optional()
});

/** Constant-time string comparison over SHA-256 digests so length does not leak */
function safeEqual(a: string, b: string): boolean {
  const ha = createHash('sha256').update(a).digest();
  const hb = createHash('sha256').update(b).digest();
  return timingSafeEqual(ha, hb);
}

function errorEnvelope(error_code: ExecutionFailure['error_code'], error_message: string) {
  return { is_error: true, error_code, error_message };
}

export function createApiKeyMiddleware(apiKey: string, logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      logger.error('DAMIEN_MCP_SERVER_API_KEY is not set; rejecting protected request');
      res.status(500).json(errorEnvelope('INTERNAL_ERROR', 'API key not configured on server.'));
      return;
    }
    const presented = req.get('X-API-Key');
    // Same answer for a missing and a wrong key
    if (!presented || !safeEqual(presented, apiKey)) {
      res.status(403).json(errorEnvelope('AUTH_ERROR', 'Invalid or missing API Key.'));
      return;
    }
    next();
  };
}

// body-parser failures carry a 4xx `status` and a `type` such as entity.too.large
function clientErrorOf(err: unknown): { status: number; type?: string; message: string } | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err) || typeof err.status !== 'number') return undefined;
  if (err.status < 400 || err.status >= 500) return undefined;
  return {
    status: err.status,
    type: 'type' in err && typeof err.type === 'string' ? err.type : undefined,
    message: 'message' in err && typeof err.message === 'string' ? err.message : 'Bad request.'
  };
}

export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (res.headersSent) return;

    const clientError = clientErrorOf(err);
    if (clientError) {
      const message = clientError.type === 'entity.parse.failed' ? 'Request body is not valid JSON.'
        : clientError.type === 'entity.too.large' ? `Request body exceeds the ${BODY_LIMIT} limit.`
        : clientError.message;
      logger.warn(`${req.method} ${req.path} rejected (${clientError.status}): ${message}`);
      res.status(clientError.status).json(errorEnvelope('VALIDATION_ERROR', message));
      return;
    }

    logger.error(`${req.method} ${req.path} failed: ${describeError(err)}`);
    res.status(500).json(errorEnvelope('INTERNAL_ERROR', INTERNAL_ERROR_MESSAGE));
  };
}

export function createApp(deps: AppDeps): express.Express {
  const logger = deps.logger.child('http');
  const app = express();
  const requireApiKey = createApiKeyMiddleware(deps.apiKey, logger);

  // Bodies are parsed only after the API key check
  const parseJson = express.json({ limit: BODY_LIMIT });

  app.use(cors());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.get('/mcp/list_tools', requireApiKey, (_req, res) => {
    res.json(deps.registry.listTools());
  });

  app.post('/mcp/execute_tool', requireApiKey, parseJson, async (req, res, next) => {
    try {
      const envelope = InvocationEnvelope.safeParse(req.body);
      if (!envelope.success) {
        const listing = toValidationIssues(envelope.error).map(i => `${i.field}: ${i.reason}`).join('; ');
        res.json({
          tool_result_id: uuidv4(),
          ...errorEnvelope('VALIDATION_ERROR', `Invalid tool invocation: ${listing}`)
        });
        return;
      }
      logger.info(`execute_tool ${envelope.data.tool_name} (session ${envelope.data.session_id})`);
      res.json(await deps.dispatcher.execute(envelope.data));
    } catch (error) {
      next(error);
    }
  });

  app.get('/mcp/protected-test', requireApiKey, (_req, res) => {
    res.json({ message: 'Access granted to protected route!' });
  });

  app.get('/mcp/gmail-test', requireApiKey, async (_req, res) => {
    try {
      const mail = await deps.mail.get();
      const account = await mail.verifyConnection();
      res.json({ status: 'connected', email: account.email ?? null, provider: account.provider ?? null });
    } catch (error) {
      const body = toErrorBody(classifyFailure(error));
      logger.warn(`Mail backend check failed: ${describeError(error)}`);
      res.status(503).json({ status: 'unavailable', ...errorEnvelope(body.error_code, body.error_message) });
    }
  });

  app.use(createErrorHandler(logger));

  return app;
}
