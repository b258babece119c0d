import { v4 as uuidv4 } from 'uuid';
import { Logger, describeError } from '../logger';
import { MailBackendProvider } from '../mail/provider';
import { RuleStore } from '../rules/ruleStore';
import { appendInteraction, summarizeOutput } from '../session/interactions';
import { SessionStore, emptySessionState } from '../session/sessionStore';
import { ExecutionFailure, ExecutionResult, Invocation, SessionKey, SessionState } from '../types';
import { Failure, classifyFailure, settle, toErrorBody } from './normalizer';
import { BoundCall, ToolDefinition, ToolRegistry } from './registry';

export interface DispatcherSettings {
  defaultUserId: string;
  sessionTtlSeconds: number;
  applyRulesScanLimit: number;
}

export interface DispatcherDeps {
  registry: ToolRegistry;
  mail: MailBackendProvider;
  rules: RuleStore;
  sessions: SessionStore;
  logger: Logger;
  settings: DispatcherSettings;
  newId?: () => string;
  now?: () => Date;
}

/**
 * Turns an invocation into exactly one ExecutionResult:
 * resolve, validate, load session, execute, update session, respond.
 * Nothing thrown below this point reaches the caller.
 */
export class ToolDispatcher {
  private logger: Logger;
  private newId: () => string;
  private now: () => Date;

  constructor(private deps: DispatcherDeps) {
    this.logger = deps.logger.child('dispatcher');
    this.newId = deps.newId ?? uuidv4;
    this.now = deps.now ?? (() => new Date());
  }

  async execute(invocation: Invocation): Promise<ExecutionResult> {
    const toolResultId = this.newId();
    try {
      return await this.run(toolResultId, invocation);
    } catch (error) {
      return this.fail(toolResultId, invocation.tool_name, classifyFailure(error));
    }
  }

  private async run(toolResultId: string, invocation: Invocation): Promise<ExecutionResult> {
    const definition = this.deps.registry.resolve(invocation.tool_name);
    if (!definition) {
      return this.fail(toolResultId, invocation.tool_name, { kind: 'unknown_tool', toolName: invocation.tool_name });
    }

    let call: BoundCall;
    try {
      call = definition.bind(invocation.input);
    } catch (error) {
      return this.fail(toolResultId, definition.name, classifyFailure(error));
    }

    const key: SessionKey = {
      ownerId: invocation.user_id || this.deps.settings.defaultUserId,
      sessionId: invocation.session_id
    };
    const session = definition.session === 'record' ? await this.loadSession(key) : emptySessionState();

    if (definition.destructive) {
      this.logger.warn(
        `${definition.name} is irreversible; running for ${key.ownerId}/${key.sessionId} with input ${JSON.stringify(call.input)}`
      );
    }

    const outcome = await settle(call.execute({
      mail: () => this.deps.mail.get(),
      rules: this.deps.rules,
      session,
      logger: this.deps.logger.child(definition.name),
      settings: { applyRulesScanLimit: this.deps.settings.applyRulesScanLimit }
    }));
    if (!outcome.ok) {
      return this.fail(toolResultId, definition.name, outcome.failure);
    }

    if (definition.session === 'record') {
      const next = outcome.value.updateSession(appendInteraction(session, {
        tool_result_id: toolResultId,
        tool_name: definition.name,
        input: call.input,
        output_summary: summarizeOutput(outcome.value.output),
        at: this.now().toISOString()
      }));
      await this.saveSession(key, next, definition);
    }

    if (definition.mutating) {
      this.logger.info(`${definition.name} completed for ${key.ownerId}/${key.sessionId} (${toolResultId})`);
    } else {
      this.logger.debug(`${definition.name} succeeded (${toolResultId})`);
    }
    return { tool_result_id: toolResultId, is_error: false, output: outcome.value.output };
  }

  // Session problems never fail the call
  private async loadSession(key: SessionKey): Promise<SessionState> {
    try {
      const context = await this.deps.sessions.get(key);
      return context ? context.state : emptySessionState();
    } catch (error) {
      this.logger.warn(`Could not load session ${key.ownerId}/${key.sessionId}; starting empty: ${describeError(error)}`);
      return emptySessionState();
    }
  }

  private async saveSession(key: SessionKey, state: SessionState, definition: ToolDefinition): Promise<void> {
    try {
      await this.deps.sessions.put(key, state, this.deps.settings.sessionTtlSeconds);
    } catch (error) {
      this.logger.warn(`Could not save session ${key.ownerId}/${key.sessionId} after ${definition.name}: ${describeError(error)}`);
    }
  }

  private fail(toolResultId: string, toolName: string, failure: Failure): ExecutionFailure {
    const body = toErrorBody(failure);
    if (failure.kind === 'internal') {
      this.logger.error(`${toolName} failed with an unexpected error (${toolResultId}): ${describeError(failure.error)}`);
    } else {
      this.logger.warn(`${toolName} failed: ${body.error_code} ${body.error_message}`);
    }
    return { tool_result_id: toolResultId, is_error: true, ...body };
  }
}
