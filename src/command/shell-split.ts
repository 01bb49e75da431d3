/**
 * Shell word splitting
 *
 * Splits a command string into words with POSIX shell quoting rules:
 * whitespace separates words, single quotes preserve everything literally,
 * double quotes allow `\` to escape `\ " $ \``, and outside quotes `\` escapes
 * any character. Adjacent quoted and unquoted parts join into one word.
 * `#` has no special meaning.
 */

export class ShellSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShellSyntaxError';
  }
}

type SplitState = 'between' | 'word' | 'single' | 'double';

const WHITESPACE = /\s/;
const DOUBLE_QUOTE_ESCAPABLE = new Set(['\\', '"', '$', '`', '\n']);

export function shellSplit(source: string): string[] {
  const words: string[] = [];
  let state: SplitState = 'between';
  let current = '';

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    switch (state) {
      case 'between':
      case 'word':
        if (WHITESPACE.test(ch)) {
          if (state === 'word') {
            words.push(current);
            current = '';
            state = 'between';
          }
        } else if (ch === "'") {
          state = 'single';
        } else if (ch === '"') {
          state = 'double';
        } else if (ch === '\\') {
          if (i + 1 >= source.length) {
            throw new ShellSyntaxError('No escaped character');
          }
          current += source[++i];
          state = 'word';
        } else {
          current += ch;
          state = 'word';
        }
        break;

      case 'single':
        if (ch === "'") {
          state = 'word';
        } else {
          current += ch;
        }
        break;

      case 'double':
        if (ch === '"') {
          state = 'word';
        } else if (ch === '\\' && i + 1 < source.length && DOUBLE_QUOTE_ESCAPABLE.has(source[i + 1])) {
          current += source[++i];
        } else {
          current += ch;
        }
        break;
    }
  }

  if (state === 'single' || state === 'double') {
    throw new ShellSyntaxError('No closing quotation');
  }
  if (state === 'word') {
    words.push(current);
  }
  return words;
}
