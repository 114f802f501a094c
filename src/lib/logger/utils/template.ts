const PLACEHOLDER_PATTERN = /{{\s*([\w.-]+)\s*}}/g;

function lookup(locals: Record<string, unknown>, path: string): unknown {
  let current: unknown = locals;

  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(part in current)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }

  return current;
}

function render(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(render).join(', ');
  }

  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Replace `{{key}}` / `{{nested.key}}` placeholders with values from `locals`.
 * Arrays are joined with `", "`; missing values render as `fallback`.
 */
export function formatTemplate(
  template: string,
  locals: Record<string, unknown>,
  fallback: string = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER_PATTERN, (_match, path: string) => {
    const value = lookup(locals, path);
    return value === undefined || value === null ? fallback : render(value);
  });
}
