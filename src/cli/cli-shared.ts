import { openProject, type ProjectContext } from '../config/context.js';

/**
 * Load config, open the db and wire the steps, or print error and exit.
 * Use at the top of every CLI command that requires an initialized project.
 */
export function requireProject(cwd?: string): ProjectContext {
  try {
    return openProject(cwd);
  } catch (err) {
    console.error((err as Error).message);
    process.exit(1);
  }
}

/** Parse a JSON object flag such as `--filters '{"deal_id":10}'`. */
export function parseJsonFlag(value: string | undefined, flag: string): Record<string, unknown> | null {
  if (value === undefined) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    console.error(`Invalid JSON in ${flag}. Example: ${flag} '{"deal_id":10}'`);
    process.exit(1);
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    console.error(`${flag} must be a JSON object`);
    process.exit(1);
  }
  return parsed as Record<string, unknown>;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
