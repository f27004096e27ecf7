// Greedy paragraph filling. Only ASCII whitespace separates words, so `~` and
// U+00A0 keep their neighbours together. Trimming and blank-line detection use
// the same class: a line the filler ends with U+00A0 must read back unchanged.
const ASCII_WHITESPACE_RE = /[ \t\n\v\f\r]+/;
const LEADING_RE = /^[ \t\n\v\f\r]+/;
const TRAILING_RE = /[ \t\n\v\f\r]+$/;

export function trimStartAscii(s: string): string {
  return s.replace(LEADING_RE, "");
}

export function trimEndAscii(s: string): string {
  return s.replace(TRAILING_RE, "");
}

export function trimAscii(s: string): string {
  return trimEndAscii(trimStartAscii(s));
}

export function isBlankLine(s: string): boolean {
  return trimStartAscii(s).length === 0;
}

function columns(s: string): number {
  let n = 0;
  for (const _ of s) n++;
  return n;
}

export function splitWords(text: string): string[] {
  return text.split(ASCII_WHITESPACE_RE).filter((w) => w.length > 0);
}

/**
 * Wrap `text` into lines of at most `width` columns. Words are never broken;
 * a word wider than `width` gets a line of its own. Whitespace runs collapse
 * to one space.
 */
export function fillParagraph(text: string, width: number): string {
  const lines: string[] = [];
  let current = "";
  let currentWidth = 0;
  for (const word of splitWords(text)) {
    const w = columns(word);
    if (current.length === 0) {
      current = word;
      currentWidth = w;
    } else if (currentWidth + 1 + w <= width) {
      current += " " + word;
      currentWidth += 1 + w;
    } else {
      lines.push(current);
      current = word;
      currentWidth = w;
    }
  }
  if (current.length > 0) lines.push(current);
  return lines.join("\n");
}
