import {
  deleteEmailsPermanently,
  getEmailDetails,
  labelEmails,
  listEmails,
  markEmails,
  trashEmails
} from './emailTools';
import { ToolRegistry } from './registry';
import { addRule, applyRules, deleteRule, listRules } from './ruleTools';

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry([
    listEmails,
    getEmailDetails,
    trashEmails,
    labelEmails,
    markEmails,
    applyRules,
    listRules,
    addRule,
    deleteRule,
    deleteEmailsPermanently
  ]);
}
