/**
 * @module variable-resolver
 * Template variable resolution for manifest values.
 * Supports {{env.XXX}}, {{var.xxx}} and {{date}} in strings and nested objects.
 */

export interface VariableContext {
  /** Manifest `variables`, overridden by `--var` */
  vars: Record<string, string>;
  env: Record<string, string | undefined>;
}

/**
 * Replace `{{xxx}}` template variables in a string.
 *
 * - `{{date}}` → current date in `YYYYMMDD` format
 * - `{{env.XXX}}` → value of the environment variable
 * - `{{var.xxx}}` or `{{xxx}}` → manifest variable
 *
 * Undefined variables are preserved as-is (e.g. `{{unknown}}` stays `{{unknown}}`).
 */
export function resolveVariables(template: string, context: VariableContext): string {
  return template.replace(/\{\{(.+?)\}\}/g, (_match, expr: string) => {
    const trimmed = expr.trim();

    if (trimmed === 'date') {
      return new Date().toISOString().slice(0, 10).replace(/-/g, '');
    }

    if (trimmed.startsWith('env.')) {
      const value = context.env[trimmed.slice(4)];
      return value ?? `{{${trimmed}}}`;
    }

    const varKey = trimmed.startsWith('var.') ? trimmed.slice(4) : trimmed;
    return context.vars[varKey] ?? `{{${trimmed}}}`;
  });
}

/**
 * Recursively resolve template variables in an object, array, or string.
 * Object keys are resolved too, since build-arg names may be templated.
 */
export function resolveObjectVariables(obj: unknown, context: VariableContext): unknown {
  if (typeof obj === 'string') {
    return resolveVariables(obj, context);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveObjectVariables(item, context));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[resolveVariables(key, context)] = resolveObjectVariables(value, context);
    }
    return result;
  }

  return obj;
}
