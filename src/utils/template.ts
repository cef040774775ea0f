/**
 * Fill `{{name}}` placeholders in a command template. Unknown placeholders are
 * left in place so shell syntax such as `find -exec ... {}` passes through.
 */
export function renderCommand(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}
