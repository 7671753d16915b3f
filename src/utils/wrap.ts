/**
 * Greedy word wrap
 */

import stringWidth from 'string-width';

/**
 * Cut a word into pieces no wider than `width` columns
 */
function splitWord(word: string, width: number): string[] {
  if (stringWidth(word) <= width) {
    return [word];
  }
  const pieces: string[] = [];
  let current = '';
  for (const char of word) {
    if (current && stringWidth(current + char) > width) {
      pieces.push(current);
      current = '';
    }
    current += char;
  }
  if (current) {
    pieces.push(current);
  }
  return pieces;
}

/**
 * Wrap a single line of text into lines no wider than `width` columns.
 * Breaks at whitespace; a word wider than the line is split.
 */
export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(1, Math.floor(width));
  const words = text.trim().split(/\s+/).filter(Boolean);

  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    for (const piece of splitWord(word, limit)) {
      if (!current) {
        current = piece;
        continue;
      }
      const candidate = `${current} ${piece}`;
      if (stringWidth(candidate) <= limit) {
        current = candidate;
        continue;
      }
      lines.push(current);
      current = piece;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

/**
 * Wrap text that may already contain line breaks; each line is wrapped on its own
 */
export function fillText(text: string, width: number): string {
  return text
    .split('\n')
    .map((line) => wrapText(line, width).join('\n'))
    .join('\n');
}
