import { describe, it, expect } from '@jest/globals';
import { RuleNotFoundError } from '../../../src/errors';
import { silentLogger } from '../../../src/logger';
import {
  actionKey,
  applyRules,
  buildRuleQuery,
  evaluateCondition,
  matchesRule,
  selectRules
} from '../../../src/rules/ruleEngine';
import { MailMessage } from '../../../src/types';
import { FakeMailbox } from '../../helpers/fakeMailbox';
import { makeRule } from '../../helpers/harness';

function message(overrides: Partial<MailMessage> = {}): MailMessage {
  return {
    id: 'm1',
    subject: 'Your Weekly Digest',
    from: 'Digest <digest@news.example>',
    to: ['me@example.com', 'team@example.com'],
    snippet: 'Top stories this week',
    hasAttachments: false,
    labels: ['INBOX', 'CATEGORY_PROMOTIONS'],
    unread: true,
    ...overrides
  };
}

describe('buildRuleQuery', () => {
  it('should combine the filter with converted dates', () => {
    expect(buildRuleQuery({ gmail_query_filter: ' from:shop ', date_after: '2024/03/01', date_before: '2024/04/01' }))
      .toBe('from:shop after:2024-03-01 before:2024-04-01');
  });

  it('should return an empty query for all_mail', () => {
    expect(buildRuleQuery({ gmail_query_filter: 'is:unread', date_after: '2024/03/01', all_mail: true })).toBe('');
  });

  it('should return an empty query when nothing is given', () => {
    expect(buildRuleQuery({})).toBe('');
  });
});

describe('evaluateCondition', () => {
  it('should compare case-insensitively', () => {
    expect(evaluateCondition(message(), { field: 'subject', operator: 'contains', value: 'weekly' })).toBe(true);
    expect(evaluateCondition(message(), { field: 'from', operator: 'ends_with', value: 'NEWS.EXAMPLE>' })).toBe(true);
    expect(evaluateCondition(message(), { field: 'subject', operator: 'starts_with', value: 'your' })).toBe(true);
    expect(evaluateCondition(message(), { field: 'body_snippet', operator: 'equals', value: 'top stories this week' })).toBe(true);
  });

  it('should match multi-valued fields when any value matches', () => {
    expect(evaluateCondition(message(), { field: 'to', operator: 'equals', value: 'team@example.com' })).toBe(true);
    expect(evaluateCondition(message(), { field: 'label', operator: 'equals', value: 'inbox' })).toBe(true);
  });

  it('should require no value to match for negated operators', () => {
    expect(evaluateCondition(message(), { field: 'to', operator: 'not_equals', value: 'team@example.com' })).toBe(false);
    expect(evaluateCondition(message(), { field: 'label', operator: 'not_contains', value: 'spam' })).toBe(true);
    expect(evaluateCondition(message(), { field: 'subject', operator: 'not_contains', value: 'digest' })).toBe(false);
  });

  it('should treat a missing field as matching nothing', () => {
    const bare = message({ subject: undefined });

    expect(evaluateCondition(bare, { field: 'subject', operator: 'contains', value: 'x' })).toBe(false);
    expect(evaluateCondition(bare, { field: 'subject', operator: 'not_equals', value: 'x' })).toBe(true);
  });
});

describe('matchesRule', () => {
  const conditions = [
    { field: 'from' as const, operator: 'contains' as const, value: 'news.example' },
    { field: 'subject' as const, operator: 'contains' as const, value: 'invoice' }
  ];

  it('should require every condition under AND', () => {
    expect(matchesRule(message(), makeRule({ id: 'r', name: 'r', conditions }))).toBe(false);
  });

  it('should require any condition under OR', () => {
    expect(matchesRule(message(), makeRule({ id: 'r', name: 'r', conditions, condition_conjunction: 'OR' }))).toBe(true);
  });
});

describe('selectRules', () => {
  const rules = [
    makeRule({ id: 'r1', name: 'One' }),
    makeRule({ id: 'r2', name: 'Two', is_enabled: false }),
    makeRule({ id: 'r3', name: 'Three' })
  ];

  it('should pick enabled rules by default', () => {
    expect(selectRules(rules).map(r => r.id)).toEqual(['r1', 'r3']);
  });

  it('should keep the requested order and skip disabled ones', () => {
    expect(selectRules(rules, ['r3', 'r2', 'r1']).map(r => r.id)).toEqual(['r3', 'r1']);
  });

  it('should throw RuleNotFoundError naming every unknown id', () => {
    expect(() => selectRules(rules, ['r1', 'x', 'y'])).toThrow(new RuleNotFoundError('x, y'));
  });
});

describe('actionKey', () => {
  it('should include the label for label actions', () => {
    expect(actionKey({ type: 'add_label', label_name: 'Bills' })).toBe('add_label:Bills');
    expect(actionKey({ type: 'mark_read' })).toBe('mark_read');
  });
});

describe('applyRules', () => {
  function mailbox(count: number): FakeMailbox {
    const box = new FakeMailbox();
    for (let i = 0; i < count; i++) {
      box.add({ id: `m${i}`, from: i % 2 === 0 ? 'deals@shop.example' : 'friend@example.com', unread: true });
    }
    return box;
  }

  const shopRule = makeRule({
    id: 'r1',
    name: 'Shop',
    conditions: [{ field: 'from', operator: 'contains', value: 'shop.example' }],
    actions: [{ type: 'mark_read' }, { type: 'remove_label', label_name: 'INBOX' }]
  });

  it('should page through the mailbox up to the scan limit', async () => {
    const box = mailbox(250);

    const report = await applyRules(box, [shopRule], { dryRun: true, scanLimit: 230 }, silentLogger);

    expect(report.total_emails_scanned).toBe(230);
    expect(report.emails_matching_any_rule).toBe(115);
    expect(box.calls.map(c => c.args[0])).toEqual([
      { query: undefined, maxResults: 100, pageToken: undefined },
      { query: undefined, maxResults: 100, pageToken: '100' },
      { query: undefined, maxResults: 30, pageToken: '200' }
    ]);
  });

  it('should group matched messages per action and execute them on a live run', async () => {
    const box = mailbox(4);

    const report = await applyRules(box, [shopRule], { dryRun: false, scanLimit: 500 }, silentLogger);

    expect(report).toEqual({
      dry_run: false,
      effective_query: '',
      rules_applied: ['Shop'],
      total_emails_scanned: 4,
      emails_matching_any_rule: 2,
      actions_planned_or_taken: { mark_read: 2, 'remove_label:INBOX': 2 },
      rule_match_counts: { Shop: 2 }
    });
    expect(box.mutations()).toEqual([
      { method: 'markMessages', args: [['m0', 'm2'], 'read'] },
      { method: 'modifyLabels', args: [['m0', 'm2'], [], ['INBOX']] }
    ]);
    expect(box.labelsOf('m0')).toEqual([]);
    expect(box.labelsOf('m1')).toEqual(['INBOX', 'UNREAD']);
  });

  it('should count a message once even when several rules match it', async () => {
    const box = mailbox(2);
    const second = makeRule({
      id: 'r2',
      name: 'Unread',
      conditions: [{ field: 'label', operator: 'equals', value: 'unread' }],
      actions: [{ type: 'mark_read' }]
    });

    const report = await applyRules(box, [shopRule, second], { dryRun: true, scanLimit: 10 }, silentLogger);

    expect(report.emails_matching_any_rule).toBe(2);
    expect(report.rule_match_counts).toEqual({ Shop: 1, Unread: 2 });
    expect(report.actions_planned_or_taken).toEqual({ mark_read: 2, 'remove_label:INBOX': 1 });
  });

  it('should report rules and labels whatever their names', async () => {
    const box = mailbox(2);
    const odd = makeRule({
      id: 'r9',
      name: '__proto__',
      conditions: [{ field: 'from', operator: 'contains', value: 'shop.example' }],
      actions: [{ type: 'add_label', label_name: 'constructor' }]
    });

    const report = await applyRules(box, [odd], { dryRun: true, scanLimit: 10 }, silentLogger);

    expect(Object.entries(report.rule_match_counts)).toEqual([['__proto__', 1]]);
    expect(Object.entries(report.actions_planned_or_taken)).toEqual([['add_label:constructor', 1]]);
  });

  it('should not scan when there are no rules to apply', async () => {
    const box = mailbox(3);

    const report = await applyRules(box, [], { dryRun: false, scanLimit: 10 }, silentLogger);

    expect(report.total_emails_scanned).toBe(0);
    expect(box.calls).toHaveLength(0);
  });

  it('should propagate a failing mutation', async () => {
    const box = mailbox(2);
    box.failOn('markMessages', new Error('write failed'));

    await expect(applyRules(box, [shopRule], { dryRun: false, scanLimit: 10 }, silentLogger)).rejects.toThrow('write failed');
  });
});
