/**
 * String helpers.
 */

/**
 * Upper-case the first character and leave the rest untouched,
 * e.g. `rebase-strategies` -> `Rebase-strategies`.
 */
export function capitalizeFirst(str: string): string {
  if (str.length === 0) {
    return str;
  }
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Replace `{{KEY}}` placeholders. Unknown keys are left in place.
 */
export function fillPlaceholders(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match
  );
}
