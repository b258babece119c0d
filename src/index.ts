#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { AppConfig, loadConfig } from './config';
import { Logger, createLogger, describeError } from './logger';
import { createNylasMailBackend } from './mail/factory';
import { MailBackendProvider } from './mail/provider';
import { JsonFileRuleStore } from './rules/ruleStore';
import { SERVICE_VERSION, createApp } from './server';
import { DynamoSessionStore, createDynamoSessionTable } from './session/dynamoSessionStore';
import { InMemorySessionStore, SessionStore } from './session/sessionStore';
import { ToolDispatcher } from './tools/dispatcher';
import { createToolRegistry } from './tools';

function createSessionStore(config: AppConfig, logger: Logger): SessionStore {
  if (config.session.store === 'dynamodb') {
    logger.info(`Sessions: DynamoDB table ${config.session.tableName} (${config.session.region})`);
    return new DynamoSessionStore(createDynamoSessionTable(config.session.tableName, config.session.region));
  }
  logger.info('Sessions: in-memory (lost on restart)');
  return new InMemorySessionStore();
}

function main(): void {
  const config = loadConfig();
  const logger = createLogger('damien', config.logLevel);

  if (!config.apiKey) {
    logger.warn('DAMIEN_MCP_SERVER_API_KEY is not set; every /mcp route will answer 500');
  }

  const registry = createToolRegistry();
  const mail = new MailBackendProvider(() => createNylasMailBackend(config, logger.child('mail')));
  const rules = new JsonFileRuleStore(path.resolve(config.rulesFile));

  const dispatcher = new ToolDispatcher({
    registry,
    mail,
    rules,
    sessions: createSessionStore(config, logger),
    logger,
    settings: {
      defaultUserId: config.defaultUserId,
      sessionTtlSeconds: config.session.ttlSeconds,
      applyRulesScanLimit: config.applyRulesScanLimit
    }
  });

  const app = createApp({ apiKey: config.apiKey, registry, dispatcher, mail, logger });

  app.listen(config.port, () => {
    logger.info(`Damien MCP server v${SERVICE_VERSION} listening on port ${config.port}`);
    logger.info(`Tools: ${registry.names().join(', ')}`);
    logger.info('Available endpoints:');
    logger.info('  GET  /health - Health check');
    logger.info('  GET  /mcp/list_tools - Tool discovery');
    logger.info('  POST /mcp/execute_tool - Tool execution');
    logger.info('  GET  /mcp/gmail-test - Mail backend connectivity check');
  });
}

try {
  main();
} catch (error) {
  console.error(`Failed to start: ${describeError(error)}`);
  process.exit(1);
}
