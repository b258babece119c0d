import { z } from 'zod';
import { RuleDefinitionSchema, RuleSchema } from '../rules/schema';

// Agents often send numbers as strings; accept "25" but not "25.5" or "abc"
function integer(schema: z.ZodNumber) {
  return z.preprocess(
    value => (typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : value),
    schema.int()
  );
}

const MessageIds = z.array(z.string().min(1, 'Message id must not be empty'))
  .min(1, 'At least one message id is required');

const RuleDate = z.string().regex(/^\d{4}\/\d{2}\/\d{2}$/, 'Expected a date formatted YYYY/MM/DD');

// ---------- inputs ----------

export const ListEmailsInput = z.object({
  query: z.string().optional()
    .describe('Gmail search query, e.g. "is:unread from:alice@example.com"'),
  max_results: integer(z.number().min(1).max(100)).default(10)
    .describe('Maximum number of emails to return (1-100, default 10)'),
  page_token: z.string().optional()
    .describe('next_page_token from a previous call, to fetch the following page')
}).strict().describe('List emails in the mailbox, optionally filtered by a Gmail search query. Returns summaries and a token for the next page.');

export const GetEmailDetailsInput = z.object({
  message_id: z.string().min(1).describe('Id of the email to fetch'),
  format: z.enum(['full', 'metadata', 'raw']).default('full')
    .describe('full: headers and body as Markdown; metadata: summary fields only; raw: the raw MIME message')
}).strict().describe('Get the details of one email: sender, recipients, labels, read state and, depending on format, headers, body or raw MIME.');

export const TrashEmailsInput = z.object({
  message_ids: MessageIds.describe('Ids of the emails to move to trash')
}).strict().describe('Move emails to the trash. Trashed emails can be restored from Gmail.');

function hasLabels(value: unknown): boolean {
  return value !== undefined && !(Array.isArray(value) && value.length === 0);
}

// The label check runs before the object parse so it is reported even when
// other fields are invalid
export const LabelEmailsInput = z.preprocess((value, ctx) => {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const fields = new Map(Object.entries(value));
    if (!hasLabels(fields.get('add_label_names')) && !hasLabels(fields.get('remove_label_names'))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['add_label_names'],
        message: 'Provide at least one label to add or remove'
      });
    }
  }
  return value;
}, z.object({
  message_ids: MessageIds.describe('Ids of the emails to relabel'),
  add_label_names: z.array(z.string().min(1)).optional()
    .describe('Labels to add; missing labels are created. UNREAD and STARRED set the matching flags.'),
  remove_label_names: z.array(z.string().min(1)).optional()
    .describe('Labels to remove')
}).strict()).describe('Add and/or remove Gmail labels on emails.');

export const MarkEmailsInput = z.object({
  message_ids: MessageIds.describe('Ids of the emails to mark'),
  mark_as: z.enum(['read', 'unread']).describe('New read state')
}).strict().describe('Mark emails as read or unread.');

export const DeleteEmailsPermanentlyInput = z.object({
  message_ids: MessageIds.describe('Ids of the emails to delete forever')
}).strict().describe('PERMANENTLY delete emails. This cannot be undone; prefer damien_trash_emails unless the user explicitly asked for permanent deletion.');

export const ApplyRulesInput = z.object({
  gmail_query_filter: z.string().optional()
    .describe('Gmail search query restricting which emails are scanned'),
  rule_ids_to_apply: z.array(z.string().min(1)).optional()
    .describe('Only apply these rules (by id). Defaults to every enabled rule.'),
  dry_run: z.boolean().default(false)
    .describe('Report what would happen without changing any email'),
  scan_limit: integer(z.number().min(1)).optional()
    .describe('Maximum number of emails to scan'),
  date_after: RuleDate.optional().describe('Only scan emails received after this date (YYYY/MM/DD)'),
  date_before: RuleDate.optional().describe('Only scan emails received before this date (YYYY/MM/DD)'),
  all_mail: z.boolean().default(false)
    .describe('Scan the whole mailbox, ignoring the query and date filters')
}).strict().describe('Apply the stored filtering rules to emails matching a query. Use dry_run to preview.');

export const ListRulesInput = z.object({}).strict()
  .describe('List every stored filtering rule.');

export const AddRuleInput = z.object({
  rule_definition: RuleDefinitionSchema.describe('The rule to add')
}).strict().describe('Add a filtering rule: conditions on from/to/subject/body_snippet/label and the actions to take when they match.');

export const DeleteRuleInput = z.object({
  rule_identifier: z.string().trim().min(1).describe('Id or name of the rule to delete')
}).strict().describe('Delete a filtering rule by id or name.');

// ---------- outputs ----------

export const EmailSummaryOutput = z.object({
  id: z.string(),
  thread_id: z.string().optional(),
  subject: z.string().optional(),
  from: z.string().optional(),
  snippet: z.string().optional(),
  date: z.string().optional(),
  has_attachments: z.boolean(),
  label_ids: z.array(z.string())
});

export const ListEmailsOutput = z.object({
  email_summaries: z.array(EmailSummaryOutput),
  next_page_token: z.string().optional()
});

export const GetEmailDetailsOutput = z.object({
  id: z.string(),
  thread_id: z.string().optional(),
  label_ids: z.array(z.string()),
  snippet: z.string().optional(),
  subject: z.string().optional(),
  from: z.string().optional(),
  to: z.array(z.string()),
  date: z.string().optional(),
  internal_date: z.string().optional(),
  is_unread: z.boolean(),
  headers: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
  body: z.string().optional(),
  raw: z.string().optional()
});

export const TrashEmailsOutput = z.object({
  trashed_count: z.number().int(),
  status_message: z.string()
});

export const ModifyEmailsOutput = z.object({
  modified_count: z.number().int(),
  status_message: z.string()
});

export const DeleteEmailsPermanentlyOutput = z.object({
  deleted_count: z.number().int(),
  status_message: z.string()
});

export const ApplyRulesOutput = z.object({
  dry_run: z.boolean(),
  effective_query: z.string(),
  rules_applied: z.array(z.string()),
  total_emails_scanned: z.number().int(),
  emails_matching_any_rule: z.number().int(),
  actions_planned_or_taken: z.record(z.number().int()),
  rule_match_counts: z.record(z.number().int())
});

export const ListRulesOutput = z.object({
  rules: z.array(RuleSchema)
});

export const DeleteRuleOutput = z.object({
  status_message: z.string(),
  deleted_rule_identifier: z.string()
});
