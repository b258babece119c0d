import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import express from 'express';
import { MailAuthError } from '../../src/errors';
import { silentLogger } from '../../src/logger';
import { createApp } from '../../src/server';
import { FakeMailbox } from '../helpers/fakeMailbox';
import { Harness, createHarness } from '../helpers/harness';

const API_KEY = 'test-secret';

function buildApp(harness: Harness, apiKey = API_KEY): express.Express {
  return createApp({
    apiKey,
    registry: harness.registry,
    dispatcher: harness.dispatcher,
    mail: harness.mail,
    logger: silentLogger
  });
}

describe('HTTP Server', () => {
  let harness: Harness;
  let app: express.Express;

  beforeEach(() => {
    harness = createHarness({
      mailbox: new FakeMailbox([
        { id: 'm1', subject: 'Invoice', from: 'billing@example.com', unread: true },
        { id: 'm2', subject: 'Lunch', from: 'friend@example.com' }
      ])
    });
    app = buildApp(harness);
  });

  describe('GET /health', () => {
    it('should answer without an API key', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', service: 'damien-mcp-server', version: '0.1.0' });
    });
  });

  describe('API key', () => {
    it('should reject a missing key', async () => {
      const response = await request(app).get('/mcp/list_tools');

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        is_error: true,
        error_code: 'AUTH_ERROR',
        error_message: 'Invalid or missing API Key.'
      });
    });

    it('should reject a wrong key the same way', async () => {
      const response = await request(app).get('/mcp/protected-test').set('X-API-Key', 'wrong');

      expect(response.status).toBe(403);
      expect(response.body.error_code).toBe('AUTH_ERROR');
    });

    it('should fail closed when the server has no key configured', async () => {
      const response = await request(buildApp(harness, '')).get('/mcp/protected-test').set('X-API-Key', '');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        is_error: true,
        error_code: 'INTERNAL_ERROR',
        error_message: 'API key not configured on server.'
      });
    });

    it('should grant access to the protected test route', async () => {
      const response = await request(app).get('/mcp/protected-test').set('X-API-Key', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ message: 'Access granted to protected route!' });
    });
  });

  describe('GET /mcp/list_tools', () => {
    it('should return every tool descriptor', async () => {
      const response = await request(app).get('/mcp/list_tools').set('X-API-Key', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(10);
      expect(response.body[0]).toMatchObject({
        name: 'damien_list_emails',
        input_schema: { type: 'object' },
        output_schema: { type: 'object' }
      });
    });
  });

  describe('POST /mcp/execute_tool', () => {
    it('should execute a tool and return its result', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .set('X-API-Key', API_KEY)
        .send({ tool_name: 'damien_list_emails', input: { query: 'is:unread' }, session_id: 'conv-1' });

      expect(response.status).toBe(200);
      expect(response.body.tool_result_id).toBe('result-1');
      expect(response.body.is_error).toBe(false);
      expect(response.body.output.email_summaries.map((e: { id: string }) => e.id)).toEqual(['m1']);
      expect(response.body).not.toHaveProperty('error_code');
    });

    it('should report an unknown tool inside a 200 response', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .set('X-API-Key', API_KEY)
        .send({ tool_name: 'damien_fly', input: {}, session_id: 'conv-1' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        tool_result_id: 'result-1',
        is_error: true,
        error_code: 'UNKNOWN_TOOL',
        error_message: "Tool 'damien_fly' is not registered."
      });
    });

    it('should report a malformed envelope as a validation error', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .set('X-API-Key', API_KEY)
        .send({ tool_name: 'damien_list_emails', input: {} });

      expect(response.status).toBe(200);
      expect(response.body.is_error).toBe(true);
      expect(response.body.error_code).toBe('VALIDATION_ERROR');
      expect(response.body.error_message).toBe('Invalid tool invocation: session_id: Required');
      expect(typeof response.body.tool_result_id).toBe('string');
      expect(harness.backendInits()).toBe(0);
    });

    it('should reject a body that is not JSON', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .set('X-API-Key', API_KEY)
        .set('Content-Type', 'application/json')
        .send('{"tool_name": ');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        is_error: true,
        error_code: 'VALIDATION_ERROR',
        error_message: 'Request body is not valid JSON.'
      });
    });

    it('should check the API key before reading the body', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .set('Content-Type', 'application/json')
        .send('{bad');

      expect(response.status).toBe(403);
      expect(response.body.error_code).toBe('AUTH_ERROR');
    });

    it('should reject a body over the size limit', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .set('X-API-Key', API_KEY)
        .send({ tool_name: 'damien_list_emails', input: { query: 'x'.repeat(1_100_000) }, session_id: 'conv-1' });

      expect(response.status).toBe(413);
      expect(response.body).toEqual({
        is_error: true,
        error_code: 'VALIDATION_ERROR',
        error_message: 'Request body exceeds the 1mb limit.'
      });
      expect(harness.backendInits()).toBe(0);
    });

    it('should not run tools for unauthenticated callers', async () => {
      const response = await request(app)
        .post('/mcp/execute_tool')
        .send({ tool_name: 'damien_trash_emails', input: { message_ids: ['m1'] }, session_id: 'conv-1' });

      expect(response.status).toBe(403);
      expect(harness.mailbox.mutations()).toEqual([]);
    });
  });

  describe('GET /mcp/gmail-test', () => {
    it('should report the connected account', async () => {
      const response = await request(app).get('/mcp/gmail-test').set('X-API-Key', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'connected', email: 'owner@example.com', provider: 'google' });
    });

    it('should answer 503 when the mailbox is unreachable', async () => {
      harness.mailbox.failOn('verifyConnection', new MailAuthError('Grant has expired'));

      const response = await request(app).get('/mcp/gmail-test').set('X-API-Key', API_KEY);

      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        status: 'unavailable',
        is_error: true,
        error_code: 'AUTH_ERROR',
        error_message: 'Grant has expired'
      });
    });
  });
});
