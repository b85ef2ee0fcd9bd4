import { ParsedCommandRequest } from '../types/executor.types';
import { CommandParseError } from '../errors/command.errors';

const FENCE = '```';
const EXECUTOR_DIRECTIVE = 'executor';

/**
 * Return the text between the first triple-backtick fence and the next one.
 */
export function extractCodeBlock(rawText: string): string {
  const start = rawText.indexOf(FENCE);
  if (start === -1) throw CommandParseError.noCodeBlock();

  const end = rawText.indexOf(FENCE, start + FENCE.length);
  if (end === -1) throw CommandParseError.noCodeBlock();

  return rawText.slice(start + FENCE.length, end);
}

/**
 * Split a "# key: value" line on its last colon.
 */
export function parseDirective(line: string): { key: string; value: string } {
  const body = line.replace(/^#/, '').trim();
  const sep = body.lastIndexOf(':');
  if (sep === -1) throw CommandParseError.directiveSyntax(body);

  return {
    key: body.slice(0, sep).trim(),
    value: body.slice(sep + 1).trim(),
  };
}

/**
 * Parse the contents of a fenced block. Directive lines configure the request,
 * all other lines are joined into the payload without a separator.
 */
export function parseCommandBlock(block: string): ParsedCommandRequest {
  const request: ParsedCommandRequest = { name: '', payload: '' };

  for (const line of block.split('\n').map((l) => l.trim())) {
    if (!line.startsWith('#')) {
      request.payload += line;
      continue;
    }

    const { key, value } = parseDirective(line);
    switch (key) {
      case EXECUTOR_DIRECTIVE:
        request.name = value;
        break;
      default:
        throw CommandParseError.unrecognizedDirective(key);
    }
  }

  return request;
}

export function extractRequest(rawText: string): ParsedCommandRequest {
  return parseCommandBlock(extractCodeBlock(rawText));
}

/**
 * Slack escapes these three characters in message text.
 * https://api.slack.com/reference/surfaces/formatting#escaping
 */
export function unescapeSlackText(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}
