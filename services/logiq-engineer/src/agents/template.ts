export const MISSING_STATE_VALUE = 'Not Available';

const PLACEHOLDER = /\{([a-z][a-z0-9_]*)\}/g;

/**
 * Replace `{key}` placeholders with session state values.
 */
export function renderInstruction(template: string, state: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => state[key] ?? MISSING_STATE_VALUE);
}
