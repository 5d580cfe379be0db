import { usageError } from './errors.js';

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/**
 * Splits a prompt line into words the way a POSIX shell would: single quotes
 * are literal, double quotes allow `\"` and `\\`, and a backslash outside
 * quotes escapes the next character.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | undefined;

  let index = 0;
  while (index < line.length) {
    const char = line.charAt(index);

    if (quote === "'") {
      if (char === "'") {
        quote = undefined;
      } else {
        current += char;
      }
      index += 1;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = undefined;
      } else if (char === '\\' && (line.charAt(index + 1) === '"' || line.charAt(index + 1) === '\\')) {
        current += line.charAt(index + 1);
        index += 1;
      } else {
        current += char;
      }
      index += 1;
      continue;
    }

    if (isWhitespace(char)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
      index += 1;
      continue;
    }

    inWord = true;
    if (char === "'" || char === '"') {
      quote = char === "'" ? "'" : '"';
    } else if (char === '\\') {
      if (index + 1 >= line.length) {
        throw usageError('No escaped character', 'Remove the trailing backslash.');
      }
      current += line.charAt(index + 1);
      index += 1;
    } else {
      current += char;
    }
    index += 1;
  }

  if (quote !== undefined) {
    throw usageError('No closing quotation', `Close the ${quote} quote.`);
  }

  if (inWord) {
    words.push(current);
  }

  return words;
}
