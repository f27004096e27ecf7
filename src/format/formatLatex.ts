/**
 * LaTeX source formatter.
 *
 * Prose is rewritten to one sentence per line, each sentence filled at a fixed
 * width. Comments, sectioning and preamble commands, and environment bodies
 * are copied through untouched. Runs of blank lines between paragraphs are
 * collapsed.
 *
 * The formatter is a pure function of its input and options: it keeps no
 * state between calls and never throws.
 */
import { fillParagraph, isBlankLine, splitWords, trimAscii, trimEndAscii } from "./wrap.js";
import {
  endsWithFullStop,
  groupDelta,
  hasGroupMarker,
  isProtectedLine,
  lineGroupDelta,
  splitFirstSentence,
} from "./patterns.js";
import { type Logger, silentLogger } from "../utils/log.js";

export const DEFAULT_WIDTH = 80;
export const DEFAULT_MAX_BLANK_LINES = 1;

export interface FormatOptions {
  // Column at which prose is wrapped
  width?: number;
  // Longest run of blank lines kept between paragraphs (outside environments)
  maxBlankLines?: number;
  // Receives a trace of line classification and flushes
  logger?: Logger;
}

interface ScanState {
  // Text accumulated for the line about to be emitted
  pending: string;
  // Environments currently open; lines inside are copied verbatim
  openGroups: number;
  // `pending` is complete and must be emitted before reading on
  flush: boolean;
  // `pending` is prose to be filled (false for verbatim lines)
  reflow: boolean;
}

/**
 * Feed one line (or the remainder of one) into the scanner and return what is
 * left of it. A non-empty return means `pending` must be flushed first and the
 * rest fed again.
 */
function consumeLine(state: ScanState, line: string, log: Logger): string {
  const stripped = trimAscii(line);
  const delta = lineGroupDelta(stripped);
  if (!isProtectedLine(stripped) && delta === 0 && state.openGroups === 0) {
    let [first, rest] = splitFirstSentence(stripped);
    if (groupDelta(first) !== 0) {
      // never cut an inline environment in two
      first = stripped;
      rest = "";
    }
    state.pending = state.pending.length > 0 ? `${state.pending} ${first}` : first;
    if (rest.length > 0 || endsWithFullStop(first)) state.flush = true;
    log.debug(`prose ${JSON.stringify(first)} (flush=${state.flush})`);
    return rest;
  }
  if (state.pending.length > 0) {
    // Emit what we have; this line is read again on its own
    state.flush = true;
    return line;
  }
  state.pending = trimEndAscii(line);
  state.reflow = false;
  state.flush = true;
  state.openGroups = Math.max(0, state.openGroups + delta);
  log.debug(`verbatim ${JSON.stringify(state.pending)} (openGroups=${state.openGroups})`);
  return "";
}

/**
 * Fill a finished sentence. Wrapped lines must read back as prose on a second
 * pass, so a sentence holding an inline environment, or one whose wrap would
 * start a line with a protected command, stays on a single line.
 */
function renderPending(state: ScanState, width: number): string {
  if (state.openGroups !== 0 || !state.reflow) return state.pending;
  if (!hasGroupMarker(state.pending)) {
    const filled = fillParagraph(state.pending, width);
    if (!filled.split("\n").some(isProtectedLine)) return filled;
  }
  return splitWords(state.pending).join(" ");
}

/**
 * Re-format LaTeX source text.
 *
 * @example
 * formatLatex("");
 * // => ""
 *
 * @example
 * formatLatex("One idea\nper line. Then another.");
 * // => "One idea per line.\nThen another."
 *
 * @example
 * formatLatex("First.\n\n\n\nSecond.");
 * // => "First.\n\nSecond."
 *
 * @example
 * formatLatex("\\section{Intro}\nText, %remark\nmore text.");
 * // => "\\section{Intro}\nText, %remark\nmore text."
 *
 * @example
 * formatLatex("alpha beta gamma delta.", {"width": 11});
 * // => "alpha beta\ngamma\ndelta."
 */
export function formatLatex(source: string, options: FormatOptions = {}): string {
  const width = options.width ?? DEFAULT_WIDTH;
  const maxBlankLines = options.maxBlankLines ?? DEFAULT_MAX_BLANK_LINES;
  const log = options.logger ?? silentLogger;
  const eol = source.includes("\r\n") ? "\r\n" : "\n";

  const out: string[] = [];
  const state: ScanState = { pending: "", openGroups: 0, flush: false, reflow: true };
  let blankRun = 0;

  const flushPending = () => {
    if (state.pending.length > 0) {
      out.push(renderPending(state, width));
      blankRun = 0;
    }
    state.pending = "";
    state.flush = false;
    state.reflow = true;
  };

  for (const raw of source.split(/\r?\n/)) {
    if (isBlankLine(raw)) {
      flushPending();
      blankRun++;
      if (state.openGroups > 0 || blankRun <= maxBlankLines) {
        out.push("");
      } else {
        log.debug("dropping extra blank line");
      }
      continue;
    }
    let line = raw;
    while (line.length > 0) {
      line = consumeLine(state, line, log);
      if (state.flush) flushPending();
    }
  }
  flushPending();

  return out.join(eol);
}

/** True when `source` is already in the form `formatLatex` produces. */
export function isFormatted(source: string, options: FormatOptions = {}): boolean {
  return formatLatex(source, options) === source;
}
