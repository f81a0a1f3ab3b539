export type TemplateVars = Record<string, string | string[] | boolean | undefined>;

const TOKEN =
  /\{\{#each (\w+)\}\}([\s\S]*?)\{\{\/each\}\}|\{\{#if (\w+)\}\}([\s\S]*?)\{\{\/if\}\}|\{\{(\w+)\}\}/g;

function isTruthy(value: TemplateVars[string]): boolean {
  if (value === undefined || value === false || value === '') return false;
  if (Array.isArray(value) && value.length === 0) return false;
  return true;
}

/**
 * Renders `{{var}}`, `{{#if var}}…{{else}}…{{/if}}` and
 * `{{#each list}}…{{this}}…{{/each}}` in a single pass.
 *
 * Substituted values are inserted verbatim and never re-scanned, so a value
 * that itself contains `{{…}}` or `$&` comes out unchanged. Blocks do not nest.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(
    TOKEN,
    (
      match: string,
      eachKey: string | undefined,
      eachBody: string | undefined,
      ifKey: string | undefined,
      ifBody: string | undefined,
      varKey: string | undefined,
    ) => {
      if (eachKey !== undefined && eachBody !== undefined) {
        const value = vars[eachKey];
        if (!Array.isArray(value) || value.length === 0) return '';
        const parts = eachBody.split('{{this}}').map((part) => renderTemplate(part, vars));
        return value.map((item: string) => parts.join(item)).join('');
      }

      if (ifKey !== undefined && ifBody !== undefined) {
        const [whenTrue, whenFalse = ''] = ifBody.split('{{else}}');
        return renderTemplate(isTruthy(vars[ifKey]) ? whenTrue : whenFalse, vars);
      }

      if (varKey !== undefined) {
        const value = vars[varKey];
        if (value === undefined) return match;
        if (Array.isArray(value)) return value.join(', ');
        if (typeof value === 'boolean') return String(value);
        return value;
      }

      return match;
    },
  );
}
