import { TemplateError } from './errors';

type Part = { literal: string } | { field: string };

// `{{` and `}}` are literal braces, `{name}` is a placeholder
function parse(template: string): Part[] {
  const parts: Part[] = [];
  let literal = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i];
    const next = template[i + 1];

    if (char === '{' && next === '{') {
      literal += '{';
      i += 2;
    } else if (char === '}' && next === '}') {
      literal += '}';
      i += 2;
    } else if (char === '{') {
      const end = template.indexOf('}', i + 1);
      if (end === -1) {
        throw new Error(`Unclosed placeholder in index template '${template}'`);
      }
      if (literal) {
        parts.push({ literal });
        literal = '';
      }
      parts.push({ field: template.slice(i + 1, end) });
      i = end + 1;
    } else if (char === '}') {
      throw new Error(`Single '}' in index template '${template}'`);
    } else {
      literal += char;
      i += 1;
    }
  }

  if (literal) {
    parts.push({ literal });
  }
  return parts;
}

/**
 * Placeholder names used by an index template
 */
export function templateFields(template: string): Set<string> {
  const fields = new Set<string>();
  for (const part of parse(template)) {
    if ('field' in part && part.field) {
      fields.add(part.field);
    }
  }
  return fields;
}

/**
 * Resolve an index template into a concrete path.
 *
 * @throws TemplateError when a placeholder has no value
 */
export function formatTemplate(template: string, values: Record<string, unknown>): string {
  return parse(template)
    .map(part => {
      if ('literal' in part) {
        return part.literal;
      }
      const value = values[part.field];
      if (value === undefined || value === null) {
        throw new TemplateError(template, part.field);
      }
      return String(value);
    })
    .join('');
}
