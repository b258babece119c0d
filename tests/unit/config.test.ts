import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../../src/config';
import { ConfigError } from '../../src/errors';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8892,
      apiKey: '',
      logLevel: 'info',
      defaultUserId: 'damien_default_user',
      requestTimeoutMs: 30000,
      readRetries: 2,
      rulesFile: './data/rules.json',
      applyRulesScanLimit: 500,
      session: {
        store: 'memory',
        tableName: 'DamienMCPSessions',
        region: 'us-east-1',
        ttlSeconds: 86400
      },
      nylas: {}
    });
  });

  it('should read and coerce overrides', () => {
    const config = loadConfig({
      PORT: '9000',
      DAMIEN_MCP_SERVER_API_KEY: ' test-secret ',
      DAMIEN_LOG_LEVEL: 'DEBUG',
      DAMIEN_REQUEST_TIMEOUT_SECONDS: '5',
      DAMIEN_SESSION_STORE: 'dynamodb',
      AWS_REGION: 'eu-west-1',
      NYLAS_API_KEY: 'test-key',
      NYLAS_GRANT_ID: 'grant-1'
    });

    expect(config.port).toBe(9000);
    expect(config.apiKey).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.session).toMatchObject({ store: 'dynamodb', region: 'eu-west-1' });
    expect(config.nylas).toEqual({ apiKey: 'test-key', grantId: 'grant-1', apiUri: undefined });
  });

  it('should prefer the dedicated DynamoDB region over AWS_REGION', () => {
    expect(loadConfig({ AWS_REGION: 'eu-west-1', DAMIEN_DYNAMODB_REGION: 'ap-south-1' }).session.region).toBe('ap-south-1');
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ PORT: '', DAMIEN_MCP_SERVER_API_KEY: '   ' });

    expect(config.port).toBe(8892);
    expect(config.apiKey).toBe('');
  });

  it('should reject invalid values with a ConfigError', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Invalid configuration: PORT: Expected number, received nan');
    expect(() => loadConfig({ DAMIEN_SESSION_STORE: 'redis' })).toThrow(ConfigError);
    expect(() => loadConfig({ DAMIEN_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});
