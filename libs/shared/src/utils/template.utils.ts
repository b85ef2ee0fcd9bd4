import { TemplateError } from '../errors/command.errors';

export const PAYLOAD_PLACEHOLDER = 'payload';

const OPEN = '{{';
const CLOSE = '}}';

export interface ParsedTemplate {
  before: string;
  after: string;
}

/**
 * Split a template around its single `{{payload}}` placeholder.
 * Whitespace inside the braces is allowed.
 */
export function parseTemplate(template: string): ParsedTemplate {
  const open = template.indexOf(OPEN);
  if (open === -1) {
    throw new TemplateError(
      `Template has no {{${PAYLOAD_PLACEHOLDER}}} placeholder`,
      template,
    );
  }

  const close = template.indexOf(CLOSE, open + OPEN.length);
  if (close === -1) {
    throw new TemplateError('Unclosed placeholder', template);
  }

  const name = template.slice(open + OPEN.length, close).trim();
  if (name !== PAYLOAD_PLACEHOLDER) {
    throw new TemplateError(`Unknown placeholder "${name}"`, template);
  }

  const before = template.slice(0, open);
  const after = template.slice(close + CLOSE.length);

  if (after.includes(OPEN)) {
    throw new TemplateError(
      'Template must contain exactly one placeholder',
      template,
    );
  }
  if (before.includes(CLOSE) || after.includes(CLOSE)) {
    throw new TemplateError(`Unmatched "${CLOSE}"`, template);
  }

  return { before, after };
}

/**
 * Insert the payload verbatim. No shell quoting is applied here; the template
 * author owns quoting.
 */
export function renderTemplate(template: string, payload: string): string {
  const { before, after } = parseTemplate(template);
  return before + payload + after;
}
