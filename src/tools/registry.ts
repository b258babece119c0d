import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { Logger } from '../logger';
import { MailBackend } from '../mail/backend';
import { RuleStore } from '../rules/ruleStore';
import { SessionState } from '../types';
import { validateInput } from './validator';

/** `record` tools append to the session's interaction log after success. */
export type SessionPolicy = 'none' | 'record';

export interface ToolContext {
  /** Lazily initialized, shared mail backend. */
  mail(): Promise<MailBackend>;
  rules: RuleStore;
  /** Snapshot of the caller's session; advisory only. */
  session: SessionState;
  logger: Logger;
  settings: {
    applyRulesScanLimit: number;
  };
}

export interface ToolConfig<I extends z.ZodTypeAny, O extends z.AnyZodObject> {
  name: string;
  /** Defaults to the input schema's description. */
  description?: string;
  inputSchema: I;
  outputSchema: O;
  mutating: boolean;
  /** Irreversible; logged at warn before it runs. */
  destructive?: boolean;
  session: SessionPolicy;
  execute(input: z.output<I>, ctx: ToolContext): Promise<z.input<O>>;
  updateSession?(state: SessionState, input: z.output<I>, output: z.input<O>): SessionState;
}

export interface CallResult {
  output: Record<string, unknown>;
  updateSession(state: SessionState): SessionState;
}

/** A validated invocation, ready to run. */
export interface BoundCall {
  input: Record<string, unknown>;
  execute(ctx: ToolContext): Promise<CallResult>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  outputSchema: z.AnyZodObject;
  mutating: boolean;
  destructive: boolean;
  session: SessionPolicy;
  /** Validates raw input; throws ValidationError listing every violation. */
  bind(input: unknown): BoundCall;
}

export type JsonSchema = ReturnType<typeof zodToJsonSchema>;

export interface ToolDescriptor {
  name: string;
  description: string;
  input_schema: JsonSchema;
  output_schema: JsonSchema;
}

function toRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

export function defineTool<I extends z.ZodTypeAny, O extends z.AnyZodObject>(config: ToolConfig<I, O>): ToolDefinition {
  return {
    name: config.name,
    description: config.description ?? config.inputSchema.description ?? '',
    inputSchema: config.inputSchema,
    outputSchema: config.outputSchema,
    mutating: config.mutating,
    destructive: config.destructive ?? false,
    session: config.session,
    bind(rawInput) {
      const input = validateInput(config.name, config.inputSchema, rawInput);
      return {
        input: toRecord(input),
        async execute(ctx) {
          const raw = await config.execute(input, ctx);
          const parsed = config.outputSchema.safeParse(raw);
          if (!parsed.success) {
            const first = parsed.error.issues[0];
            throw new Error(`${config.name} produced output that does not match its schema at ${first.path.join('.')}: ${first.message}`);
          }
          const output = toRecord(parsed.data);
          return {
            output,
            updateSession: state => (config.updateSession ? config.updateSession(state, input, raw) : state)
          };
        }
      };
    }
  };
}

function toJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  // The description lives on the descriptor itself
  delete json.description;
  return json;
}

/**
 * Static catalog of tools. Populated once; discovery output is computed at
 * construction so repeated calls return identical schemas in insertion order.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private descriptors: ToolDescriptor[];

  constructor(definitions: ToolDefinition[]) {
    for (const def of definitions) {
      if (this.tools.has(def.name)) {
        throw new Error(`Duplicate tool name: ${def.name}`);
      }
      this.tools.set(def.name, def);
    }
    this.descriptors = definitions.map(def => Object.freeze({
      name: def.name,
      description: def.description,
      input_schema: toJsonSchema(def.inputSchema),
      output_schema: toJsonSchema(def.outputSchema)
    }));
  }

  listTools(): ToolDescriptor[] {
    return [...this.descriptors];
  }

  getSchema(name: string): ToolDescriptor | undefined {
    return this.descriptors.find(d => d.name === name);
  }

  resolve(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }
}
