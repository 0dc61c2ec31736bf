import { collapseSpaces } from '../utils/stripMessage.js';
import { argumentCount, DIRECTIVES, type DirectiveSpec } from './registry.js';

/** A directive found in a message. `args` is empty when none was given. */
export interface ParsedDirective {
  name: string;
  args: string;
  spec: DirectiveSpec;
}

export interface ParsedMessage {
  directives: ParsedDirective[];
  /** The message with every recognised directive and its argument removed. */
  content: string;
}

// Slash runs, words, white space, then any single character
const TOKEN = /\/+|[\p{L}\p{M}\p{N}_]+|\s+|[^]/gu;
const ALPHANUMERIC = /^[\p{L}\p{N}]+$/u;
const WHITESPACE = /^\s+$/u;

export function tokenize(message: string): string[] {
  return message.match(TOKEN) ?? [];
}

/**
 * Splits a chat message into directives and plain content.
 *
 * A directive is a registered name right after a `//` token. Its argument is
 * the next word; anything else ends argument collection and is kept as plain
 * text, leaving the directive to report the missing argument itself.
 */
export function parseMessage(
  message: string,
  registry: ReadonlyMap<string, DirectiveSpec> = DIRECTIVES
): ParsedMessage {
  const trimmed = message.trim();

  if (!trimmed.includes('//')) {
    return { directives: [], content: collapseSpaces(trimmed) };
  }

  const directives: ParsedDirective[] = [];
  const content: string[] = [];

  let pendingArgs = 0;
  let previous = '';
  for (const token of tokenize(trimmed)) {
    const current = directives[directives.length - 1];
    if (pendingArgs === 0 || !current) {
      const spec = previous.startsWith('//') ? registry.get(token.toLowerCase()) : undefined;
      if (spec) {
        pendingArgs = argumentCount(spec);
        directives.push({ name: spec.name, args: '', spec });
        content.pop();
      } else {
        content.push(token);
      }
    } else if (WHITESPACE.test(token)) {
      // white space between a directive and its argument
    } else if (ALPHANUMERIC.test(token)) {
      pendingArgs -= 1;
      current.args += token;
    } else {
      pendingArgs = 0;
      content.push(token);
    }
    previous = token;
  }

  return { directives, content: collapseSpaces(content.join('').trim()) };
}
