import { RuleNotFoundError } from '../errors';
import { Logger } from '../logger';
import { MailBackend } from '../mail/backend';
import { MailMessage } from '../types';
import { Action, Condition, Rule } from './schema';

const PAGE_SIZE = 100;

export interface RuleQueryParams {
  gmail_query_filter?: string;
  date_after?: string;
  date_before?: string;
  all_mail?: boolean;
}

/**
 * Builds the provider search query the scan runs with. Dates arrive as
 * YYYY/MM/DD and are sent as YYYY-MM-DD; `all_mail` drops every filter.
 */
export function buildRuleQuery(params: RuleQueryParams): string {
  if (params.all_mail) return '';
  const parts: string[] = [];
  if (params.gmail_query_filter?.trim()) parts.push(params.gmail_query_filter.trim());
  if (params.date_after) parts.push(`after:${params.date_after.replace(/\//g, '-')}`);
  if (params.date_before) parts.push(`before:${params.date_before.replace(/\//g, '-')}`);
  return parts.join(' ');
}

/** Enabled rules, optionally restricted to the given ids. Unknown ids are an error. */
export function selectRules(rules: Rule[], ruleIds?: string[]): Rule[] {
  if (!ruleIds || ruleIds.length === 0) {
    return rules.filter(r => r.is_enabled);
  }
  const byId = new Map(rules.map(r => [r.id, r]));
  const missing = ruleIds.filter(id => !byId.has(id));
  if (missing.length > 0) {
    throw new RuleNotFoundError(missing.join(', '));
  }
  return ruleIds
    .map(id => byId.get(id))
    .filter((r): r is Rule => r !== undefined && r.is_enabled);
}

function fieldValues(message: MailMessage, field: Condition['field']): string[] {
  switch (field) {
    case 'from': return message.from ? [message.from] : [];
    case 'to': return message.to;
    case 'subject': return message.subject ? [message.subject] : [];
    case 'body_snippet': return message.snippet ? [message.snippet] : [];
    case 'label': return message.labels;
  }
}

type PositiveOperator = 'contains' | 'equals' | 'starts_with' | 'ends_with';

function compare(operator: PositiveOperator, actual: string, expected: string): boolean {
  switch (operator) {
    case 'contains': return actual.includes(expected);
    case 'equals': return actual === expected;
    case 'starts_with': return actual.startsWith(expected);
    case 'ends_with': return actual.endsWith(expected);
  }
}

/**
 * Case-insensitive. A positive operator matches when any value of the field
 * matches; a negated one when none does (so a missing field satisfies
 * `not_contains` and `not_equals`).
 */
export function evaluateCondition(message: MailMessage, condition: Condition): boolean {
  const expected = condition.value.toLowerCase();
  const values = fieldValues(message, condition.field).map(v => v.toLowerCase());

  switch (condition.operator) {
    case 'not_contains':
      return !values.some(v => compare('contains', v, expected));
    case 'not_equals':
      return !values.some(v => compare('equals', v, expected));
    default: {
      const operator = condition.operator;
      return values.some(v => compare(operator, v, expected));
    }
  }
}

export function matchesRule(message: MailMessage, rule: Rule): boolean {
  const results = rule.conditions.map(c => evaluateCondition(message, c));
  return rule.condition_conjunction === 'OR' ? results.some(Boolean) : results.every(Boolean);
}

export function actionKey(action: Action): string {
  switch (action.type) {
    case 'add_label':
    case 'remove_label':
      return `${action.type}:${action.label_name}`;
    default:
      return action.type;
  }
}

export interface ApplyRulesOptions extends RuleQueryParams {
  dryRun: boolean;
  scanLimit: number;
}

export interface ApplyRulesReport {
  dry_run: boolean;
  effective_query: string;
  rules_applied: string[];
  total_emails_scanned: number;
  emails_matching_any_rule: number;
  actions_planned_or_taken: Record<string, number>;
  rule_match_counts: Record<string, number>;
}

interface PlannedAction {
  action: Action;
  messageIds: Set<string>;
}

/**
 * Scans up to `scanLimit` messages matching the effective query, evaluates
 * each rule against them and, unless it is a dry run, performs the grouped
 * actions. Label and read-state changes run before trashing.
 */
export async function applyRules(
  backend: MailBackend,
  rules: Rule[],
  options: ApplyRulesOptions,
  logger: Logger
): Promise<ApplyRulesReport> {
  const query = buildRuleQuery(options);
  const planned = new Map<string, PlannedAction>();
  // Keyed by user-chosen names, so Maps rather than plain objects
  const ruleMatchCounts = new Map<string, number>(rules.map(rule => [rule.name, 0]));

  let scanned = 0;
  let matchingAny = 0;
  let pageToken: string | undefined;

  if (rules.length > 0) {
    do {
      const page = await backend.listMessages({
        query: query || undefined,
        maxResults: Math.min(PAGE_SIZE, options.scanLimit - scanned),
        pageToken
      });
      for (const message of page.messages.slice(0, options.scanLimit - scanned)) {
        scanned++;
        let matched = false;
        for (const rule of rules) {
          if (!matchesRule(message, rule)) continue;
          matched = true;
          ruleMatchCounts.set(rule.name, (ruleMatchCounts.get(rule.name) ?? 0) + 1);
          for (const action of rule.actions) {
            const key = actionKey(action);
            const entry = planned.get(key) ?? { action, messageIds: new Set<string>() };
            entry.messageIds.add(message.id);
            planned.set(key, entry);
          }
        }
        if (matched) matchingAny++;
      }
      pageToken = page.nextPageToken;
    } while (pageToken && scanned < options.scanLimit);
  }

  logger.info(
    `Rules scan finished: ${scanned} scanned, ${matchingAny} matched, ${planned.size} action group(s)` +
    (options.dryRun ? ' (dry run)' : '')
  );

  if (!options.dryRun) {
    const ordered = [...planned.values()].sort(
      (a, b) => Number(a.action.type === 'trash') - Number(b.action.type === 'trash')
    );
    for (const { action, messageIds } of ordered) {
      await performAction(backend, action, [...messageIds]);
    }
  }

  return {
    dry_run: options.dryRun,
    effective_query: query,
    rules_applied: rules.map(r => r.name),
    total_emails_scanned: scanned,
    emails_matching_any_rule: matchingAny,
    actions_planned_or_taken: Object.fromEntries([...planned].map(([key, { messageIds }]): [string, number] => [key, messageIds.size])),
    rule_match_counts: Object.fromEntries(ruleMatchCounts)
  };
}

async function performAction(backend: MailBackend, action: Action, messageIds: string[]): Promise<void> {
  switch (action.type) {
    case 'trash':
      return backend.trashMessages(messageIds);
    case 'add_label':
      return backend.modifyLabels(messageIds, [action.label_name], []);
    case 'remove_label':
      return backend.modifyLabels(messageIds, [], [action.label_name]);
    case 'mark_read':
      return backend.markMessages(messageIds, 'read');
    case 'mark_unread':
      return backend.markMessages(messageIds, 'unread');
  }
}
