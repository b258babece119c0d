import { z } from 'zod';

export const CONDITION_FIELDS = ['from', 'to', 'subject', 'body_snippet', 'label'] as const;
export const CONDITION_OPERATORS = [
  'contains',
  'not_contains',
  'equals',
  'not_equals',
  'starts_with',
  'ends_with'
] as const;

export const ConditionSchema = z.object({
  field: z.enum(CONDITION_FIELDS).describe('Message attribute the condition inspects'),
  operator: z.enum(CONDITION_OPERATORS).describe('Case-insensitive comparison to apply'),
  value: z.string().min(1).describe('Value to compare against')
}).strict();

const LabelName = z.string().min(1).describe('Gmail label name');

export const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('trash') }).strict(),
  z.object({ type: z.literal('add_label'), label_name: LabelName }).strict(),
  z.object({ type: z.literal('remove_label'), label_name: LabelName }).strict(),
  z.object({ type: z.literal('mark_read') }).strict(),
  z.object({ type: z.literal('mark_unread') }).strict()
]);

export const RuleDefinitionSchema = z.object({
  name: z.string().trim().min(1).describe('Unique, human-readable rule name'),
  description: z.string().optional(),
  is_enabled: z.boolean().default(true),
  conditions: z.array(ConditionSchema).min(1, 'At least one condition is required'),
  condition_conjunction: z.enum(['AND', 'OR']).default('AND')
    .describe('AND: every condition must match. OR: any condition may match.'),
  actions: z.array(ActionSchema).min(1, 'At least one action is required')
}).strict();

export const RuleSchema = RuleDefinitionSchema.extend({
  id: z.string().min(1),
  created_at: z.string(),
  updated_at: z.string()
}).strict();

export type Condition = z.infer<typeof ConditionSchema>;
export type Action = z.infer<typeof ActionSchema>;
export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;
export type RuleDefinitionInput = z.input<typeof RuleDefinitionSchema>;
export type Rule = z.infer<typeof RuleSchema>;
