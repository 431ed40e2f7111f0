// Template resolution
// Replaces {{path.to.value}} placeholders with values looked up in a workflow context

const PLACEHOLDER = /\{\{\s*([^{}]+?)\s*\}\}/g;
const SINGLE_PLACEHOLDER = /^\{\{\s*([^{}]+?)\s*\}\}$/;

/** Splits `a.b[0].c` into `['a', 'b', '0', 'c']`. */
export function parsePath(path: string): string[] {
  return path
    .replace(/\[(\d+)\]/g, '.$1')
    .split('.')
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
}

/** Dotted-path lookup through objects and arrays. Returns undefined when any segment is missing. */
export function lookupPath(context: unknown, path: string): unknown {
  let current: unknown = context;
  for (const segment of parsePath(path)) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (typeof current === 'object' && current !== null && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    } else {
      return undefined;
    }
  }
  return current;
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Resolves placeholders in one string; unresolved placeholders stay as written. */
export function renderTemplate(template: string, context: unknown): string {
  return template.replace(PLACEHOLDER, (match, path: string) => {
    const value = lookupPath(context, path);
    return value === undefined ? match : stringify(value);
  });
}

/**
 * Resolves placeholders throughout a value tree. A string consisting of exactly one
 * placeholder is replaced by the referenced value itself, keeping its type.
 */
export function resolveTemplate(value: unknown, context: unknown): unknown {
  if (typeof value === 'string') {
    const single = SINGLE_PLACEHOLDER.exec(value);
    if (single) {
      const resolved = lookupPath(context, single[1]);
      return resolved === undefined ? value : resolved;
    }
    return renderTemplate(value, context);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveTemplate(item, context));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveTemplate(v, context)]));
  }
  return value;
}
