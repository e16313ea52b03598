import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

/** True for the error `readFile` raises when the path does not exist. */
export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Read a `.json` file as JSON, anything else as YAML. Not validated. */
export async function readStructuredFile(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}
