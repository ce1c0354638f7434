/**
 * Text helpers for the standard (WinAnsi-encoded) PDF fonts.
 */

// Characters above Latin-1 that WinAnsi still encodes
const WIN_ANSI_EXTRAS = new Set(
  Array.from('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ'),
);

const REPLACEMENTS: Record<string, string> = {
  '→': '->',
  '←': '<-',
  '≥': '>=',
  '≤': '<=',
  '✓': '-',
  '✔': '-',
  '▪': '•',
  '●': '•',
  '◦': '•',
  '\t': ' ',
};

const COMBINING_MARK = /^[\u0300-\u036f]$/;

function isWinAnsi(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  if (code >= 0x20 && code <= 0x7e) return true;
  if (code >= 0xa0 && code <= 0xff) return true;
  return WIN_ANSI_EXTRAS.has(char);
}

/**
 * Replace characters the standard fonts cannot encode. Accented letters outside
 * Latin-1 lose their marks, anything else becomes "?". Newlines are kept.
 * Decomposed accents are composed first; a mark with nothing to combine with is dropped.
 */
export function toWinAnsi(text: string): string {
  let out = '';
  for (const char of text.normalize('NFC').replace(/\r/g, '')) {
    if (char === '\n') {
      out += char;
    } else if (COMBINING_MARK.test(char)) {
      continue;
    } else if (char in REPLACEMENTS) {
      out += REPLACEMENTS[char];
    } else if (isWinAnsi(char)) {
      out += char;
    } else {
      const stripped = char.normalize('NFKD').replace(/[\u0300-\u036f]/g, '');
      out += stripped && Array.from(stripped).every(isWinAnsi) ? stripped : '?';
    }
  }
  return out;
}

/**
 * Greedy word wrap. `measure` returns the rendered width of a string in the
 * same unit as maxWidth. Explicit newlines start a new line; words wider than
 * maxWidth are split by character.
 */
export function wrapText(
  text: string,
  measure: (value: string) => number,
  maxWidth: number,
): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    const words = paragraph.split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      lines.push('');
      continue;
    }

    let current = '';
    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      if (measure(candidate) <= maxWidth) {
        current = candidate;
        continue;
      }
      if (current) lines.push(current);

      if (measure(word) <= maxWidth) {
        current = word;
        continue;
      }
      // hard-split an overlong word
      current = '';
      for (const char of word) {
        if (current && measure(current + char) > maxWidth) {
          lines.push(current);
          current = char;
        } else {
          current += char;
        }
      }
    }
    if (current) lines.push(current);
  }

  return lines;
}
