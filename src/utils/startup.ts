const STARTUP_VAR = /\{\{([A-Z_][A-Z0-9_]*)\}\}/g;

/**
 * Placeholders the panel fills in itself; an operator is never asked for them.
 */
export const STARTUP_BUILTIN_VARS: ReadonlySet<string> = new Set(['SERVER_MEMORY']);

export const SERVER_MEMORY_TOKEN = '{{SERVER_MEMORY}}';

/**
 * Distinct `{{NAME}}` placeholders referenced by a startup command
 */
export function extractStartupVars(command: string): Set<string> {
  const names = new Set<string>();
  for (const match of command.matchAll(STARTUP_VAR)) {
    const name = match[1];
    if (name) names.add(name);
  }
  return names;
}
