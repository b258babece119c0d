import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { RuleNotFoundError, RuleStorageError, ValidationError } from '../errors';
import { Rule, RuleDefinition, RuleSchema } from './schema';

export interface RuleStore {
  list(): Promise<Rule[]>;
  add(definition: RuleDefinition): Promise<Rule>;
  /** Removes the rule whose id or name matches; throws RuleNotFoundError otherwise. */
  delete(identifier: string): Promise<Rule>;
}

const RuleFileSchema = z.array(RuleSchema);

export function findRule(rules: Rule[], identifier: string): Rule | undefined {
  const needle = identifier.trim();
  return rules.find(r => r.id === needle) ??
    rules.find(r => r.name.toLowerCase() === needle.toLowerCase());
}

/**
 * Rules persisted as a JSON array in a single file. Writes are serialized
 * within the process and land atomically (temp file + rename).
 */
export class JsonFileRuleStore implements RuleStore {
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private filePath: string,
    private now: () => Date = () => new Date()
  ) {}

  async list(): Promise<Rule[]> {
    return this.read();
  }

  add(definition: RuleDefinition): Promise<Rule> {
    return this.exclusive(async () => {
      const rules = await this.read();
      if (rules.some(r => r.name.toLowerCase() === definition.name.toLowerCase())) {
        throw new ValidationError(
          [{ field: 'rule_definition.name', reason: `A rule named '${definition.name}' already exists` }],
          'Invalid rule definition'
        );
      }
      const timestamp = this.now().toISOString();
      const rule: Rule = { ...definition, id: uuidv4(), created_at: timestamp, updated_at: timestamp };
      await this.write([...rules, rule]);
      return rule;
    });
  }

  delete(identifier: string): Promise<Rule> {
    return this.exclusive(async () => {
      const rules = await this.read();
      const target = findRule(rules, identifier);
      if (!target) {
        throw new RuleNotFoundError(identifier);
      }
      await this.write(rules.filter(r => r.id !== target.id));
      return target;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    // keep the chain alive whatever this task does
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private async read(): Promise<Rule[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new RuleStorageError(`Failed to read rules file ${this.filePath}: ${messageOf(error)}`);
    }
    if (raw.trim() === '') return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new RuleStorageError(`Rules file ${this.filePath} is not valid JSON: ${messageOf(error)}`);
    }
    const parsed = RuleFileSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new RuleStorageError(
        `Rules file ${this.filePath} is malformed at ${first.path.join('.') || '<root>'}: ${first.message}`
      );
    }
    return parsed.data;
  }

  private async write(rules: Rule[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(rules, null, 2) + '\n', 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new RuleStorageError(`Failed to write rules file ${this.filePath}: ${messageOf(error)}`);
    }
  }
}

// fs errors may come from another realm (e.g. under Jest), so no instanceof
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function messageOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
