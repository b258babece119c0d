import { applyRules as runRules, selectRules } from '../rules/ruleEngine';
import { RuleSchema } from '../rules/schema';
import { defineTool } from './registry';
import {
  AddRuleInput,
  ApplyRulesInput,
  ApplyRulesOutput,
  DeleteRuleInput,
  DeleteRuleOutput,
  ListRulesInput,
  ListRulesOutput
} from './schemas';

export const applyRules = defineTool({
  name: 'damien_apply_rules',
  inputSchema: ApplyRulesInput,
  outputSchema: ApplyRulesOutput,
  mutating: true,
  session: 'record',
  async execute(input, ctx) {
    const rules = selectRules(await ctx.rules.list(), input.rule_ids_to_apply);
    const mail = await ctx.mail();
    return runRules(mail, rules, {
      gmail_query_filter: input.gmail_query_filter,
      date_after: input.date_after,
      date_before: input.date_before,
      all_mail: input.all_mail,
      dryRun: input.dry_run,
      scanLimit: input.scan_limit ?? ctx.settings.applyRulesScanLimit
    }, ctx.logger);
  }
});

export const listRules = defineTool({
  name: 'damien_list_rules',
  inputSchema: ListRulesInput,
  outputSchema: ListRulesOutput,
  mutating: false,
  session: 'none',
  async execute(_input, ctx) {
    return { rules: await ctx.rules.list() };
  }
});

export const addRule = defineTool({
  name: 'damien_add_rule',
  inputSchema: AddRuleInput,
  outputSchema: RuleSchema,
  mutating: true,
  session: 'record',
  async execute(input, ctx) {
    const rule = await ctx.rules.add(input.rule_definition);
    ctx.logger.info(`Added rule "${rule.name}" (${rule.id})`);
    return rule;
  }
});

export const deleteRule = defineTool({
  name: 'damien_delete_rule',
  inputSchema: DeleteRuleInput,
  outputSchema: DeleteRuleOutput,
  mutating: true,
  session: 'record',
  async execute(input, ctx) {
    const removed = await ctx.rules.delete(input.rule_identifier);
    ctx.logger.info(`Deleted rule "${removed.name}" (${removed.id})`);
    return {
      status_message: `Successfully deleted rule: ${input.rule_identifier}`,
      deleted_rule_identifier: input.rule_identifier
    };
  }
});
