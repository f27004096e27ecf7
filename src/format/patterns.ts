/**
 * Line classification for the LaTeX formatter.
 *
 * All predicates take a single, already trimmed line. They are heuristics over
 * source text, not a TeX parser: a line either stays where it is (protected or
 * inside an environment) or is treated as prose and reflowed.
 */
import { trimEndAscii, trimStartAscii } from "./wrap.js";

// A `%` preceded by an even number of backslashes (zero included) starts a comment
const COMMENT_RE = /(?:^|[^\\])(?:\\\\)*%/;

const SECTION_RE = /^\\(?:part|chapter|section|subsection|subsubsection|paragraph|subparagraph|image)(?![A-Za-z])/;

// Commands that belong on a line of their own
const STANDALONE_RE = /^\\(?:documentclass|usepackage|newcommand|renewcommand|providecommand|def|input|include|bibliographystyle|bibliography|maketitle|label)(?![A-Za-z])/;

// document and abstract are structural: their bodies are prose, so they do not open a group
const DOCUMENT_RE = /^\\(?:begin|end)\{(?:document|abstract)\}/;

const GROUP_OPEN_RE = /\\begin(?![A-Za-z])|(?<!\\)\\\[/g;
const GROUP_CLOSE_RE = /\\end(?![A-Za-z])|(?<!\\)\\\]/g;

// Sentence-ending period: after a lowercase letter, digit, @, $ or }; not before \, ~, a letter,
// a digit or , ; : ) so that "e.g.\ ", "i.e.,", "Fig.~3" and "0.75" stay whole
const FULL_STOP_RE = /(?<=[@$}0-9a-z])\.(?![\\~0-9A-Za-z,;:)])/;

export function hasComment(line: string): boolean {
  return COMMENT_RE.test(line);
}

export function isSectionLine(line: string): boolean {
  return SECTION_RE.test(line);
}

export function isStandaloneCommand(line: string): boolean {
  return STANDALONE_RE.test(line);
}

export function isDocumentBoundary(line: string): boolean {
  return DOCUMENT_RE.test(line);
}

/** Lines that are emitted verbatim and never merged with neighbouring prose. */
export function isProtectedLine(line: string): boolean {
  return hasComment(line) || isSectionLine(line) || isStandaloneCommand(line) || isDocumentBoundary(line);
}

function countMatches(re: RegExp, line: string): number {
  return line.match(re)?.length ?? 0;
}

/**
 * Net number of environments (or display-math blocks) opened by `line`.
 *
 * @example
 * groupDelta("\\begin{equation}") // 1
 * groupDelta("\\begin{x} y \\end{x}") // 0
 */
export function groupDelta(line: string): number {
  return countMatches(GROUP_OPEN_RE, line) - countMatches(GROUP_CLOSE_RE, line);
}

/** The part of `line` before an unescaped `%`, or the whole line when it has no comment. */
export function stripComment(line: string): string {
  const m = COMMENT_RE.exec(line);
  return m ? line.slice(0, m.index + m[0].length - 1) : line;
}

/**
 * Group delta of a whole source line, protected or not. Commented-out markers
 * do not count, and document/abstract boundaries never open a group.
 *
 * @example
 * lineGroupDelta("\\begin{align} % numbered") // 1
 * lineGroupDelta("% \\begin{align}") // 0
 */
export function lineGroupDelta(line: string): number {
  return isDocumentBoundary(line) ? 0 : groupDelta(stripComment(line));
}

export function hasGroupMarker(line: string): boolean {
  return countMatches(GROUP_OPEN_RE, line) + countMatches(GROUP_CLOSE_RE, line) > 0;
}

/**
 * Split a line after its first sentence-ending period. The remainder has its
 * leading whitespace removed; it is empty when the line holds no full stop.
 */
export function splitFirstSentence(line: string): [string, string] {
  const m = FULL_STOP_RE.exec(line);
  if (!m) return [line, ""];
  const pos = m.index + m[0].length;
  return [line.slice(0, pos), trimStartAscii(line.slice(pos))];
}

export function endsWithFullStop(line: string): boolean {
  // Only the final period counts, so look at the last two characters on their own
  return FULL_STOP_RE.test(trimEndAscii(line).slice(-2));
}
