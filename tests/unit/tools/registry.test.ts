import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { createToolRegistry } from '../../../src/tools';
import { ToolRegistry, defineTool } from '../../../src/tools/registry';

const TOOL_NAMES = [
  'damien_list_emails',
  'damien_get_email_details',
  'damien_trash_emails',
  'damien_label_emails',
  'damien_mark_emails',
  'damien_apply_rules',
  'damien_list_rules',
  'damien_add_rule',
  'damien_delete_rule',
  'damien_delete_emails_permanently'
];

describe('ToolRegistry', () => {
  const registry = createToolRegistry();

  it('should list all ten tools in registration order', () => {
    expect(registry.listTools().map(t => t.name)).toEqual(TOOL_NAMES);
  });

  it('should return identical discovery output on repeated calls', () => {
    expect(JSON.stringify(registry.listTools())).toBe(JSON.stringify(registry.listTools()));
    expect(JSON.stringify(createToolRegistry().listTools())).toBe(JSON.stringify(registry.listTools()));
  });

  it('should describe every tool with input and output schemas', () => {
    for (const tool of registry.listTools()) {
      expect(tool.description.length).toBeGreaterThan(0);
      expect(tool.input_schema).toMatchObject({ type: 'object', additionalProperties: false });
      expect(tool.output_schema).toMatchObject({ type: 'object' });
    }
  });

  it('should expose required fields and enums in the input schema', () => {
    const mark = registry.getSchema('damien_mark_emails');

    expect(mark?.input_schema).toMatchObject({
      required: ['message_ids', 'mark_as'],
      properties: {
        mark_as: { type: 'string', enum: ['read', 'unread'] },
        message_ids: { type: 'array', minItems: 1 }
      }
    });
  });

  it('should describe coerced integers as integers with their bounds', () => {
    const list = registry.getSchema('damien_list_emails');

    expect(list?.input_schema).toMatchObject({
      properties: { max_results: { type: 'integer', minimum: 1, maximum: 100, default: 10 } }
    });
  });

  it('should return undefined for an unknown name instead of throwing', () => {
    expect(registry.getSchema('damien_fly')).toBeUndefined();
    expect(registry.resolve('damien_fly')).toBeUndefined();
  });

  it('should carry the session policy of each tool', () => {
    expect(registry.resolve('damien_list_emails')?.session).toBe('record');
    expect(registry.resolve('damien_get_email_details')?.session).toBe('none');
    expect(registry.resolve('damien_list_rules')?.session).toBe('none');
    expect(registry.resolve('damien_delete_emails_permanently')?.destructive).toBe(true);
  });

  it('should refuse duplicate tool names', () => {
    const tool = defineTool({
      name: 'dup',
      inputSchema: z.object({}).strict().describe('Duplicate'),
      outputSchema: z.object({}),
      mutating: false,
      session: 'none',
      execute: async () => ({})
    });

    expect(() => new ToolRegistry([tool, tool])).toThrow('Duplicate tool name: dup');
  });
});
