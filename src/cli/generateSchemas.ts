#!/usr/bin/env node
import { promises as fs } from 'fs';
import path from 'path';
import { createLogger } from '../logger';
import { createToolRegistry } from '../tools';
import { ToolRegistry } from '../tools/registry';

/** Writes one `<tool_name>.json` descriptor per registered tool. Returns the paths written. */
export async function writeToolSchemas(registry: ToolRegistry, outDir: string): Promise<string[]> {
  await fs.mkdir(outDir, { recursive: true });
  const written: string[] = [];
  for (const descriptor of registry.listTools()) {
    const file = path.join(outDir, `${descriptor.name}.json`);
    await fs.writeFile(file, JSON.stringify(descriptor, null, 2) + '\n', 'utf-8');
    written.push(file);
  }
  return written;
}

if (require.main === module) {
  const logger = createLogger('schemas');
  const outDir = path.resolve(process.argv[2] ?? 'schemas');
  writeToolSchemas(createToolRegistry(), outDir)
    .then(files => logger.info(`Wrote ${files.length} tool schema(s) to ${outDir}`))
    .catch(error => {
      logger.error(`Schema generation failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
}
