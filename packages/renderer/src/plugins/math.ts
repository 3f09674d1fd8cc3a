import type MarkdownIt from "markdown-it";
import { isMarkdownEnv } from "../env";
import type { StateBlock, StateInline } from "./types";

const DOLLAR = 0x24;
const BACKSLASH = 0x5c;

const isWhitespace = (code: number): boolean =>
  code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
const isDigit = (code: number): boolean => code >= 0x30 && code <= 0x39;

function mathInline(state: StateInline, silent: boolean): boolean {
  const src = state.src;
  const start = state.pos;
  if (src.charCodeAt(start) !== DOLLAR) return false;
  // `$$` inside a paragraph is left alone
  if (src.charCodeAt(start + 1) === DOLLAR) return false;
  if (start + 1 >= state.posMax || isWhitespace(src.charCodeAt(start + 1))) return false;

  let end = start + 1;
  for (;;) {
    end = src.indexOf("$", end);
    if (end === -1 || end >= state.posMax) return false;
    if (src.charCodeAt(end - 1) !== BACKSLASH) break;
    end++;
  }

  if (isWhitespace(src.charCodeAt(end - 1))) return false;
  // "$5 and $6" is prose
  if (isDigit(src.charCodeAt(end + 1))) return false;

  if (!silent) {
    const token = state.push("math_inline", "math", 0);
    token.markup = "$";
    token.content = src.slice(start + 1, end);
  }
  state.pos = end + 1;
  return true;
}

function mathBlock(state: StateBlock, startLine: number, endLine: number, silent: boolean): boolean {
  let pos = state.bMarks[startLine] + state.tShift[startLine];
  let max = state.eMarks[startLine];

  // indented code
  if (state.sCount[startLine] - state.blkIndent >= 4) return false;
  if (pos + 2 > max || state.src.slice(pos, pos + 2) !== "$$") return false;
  if (silent) return true;

  const lines: string[] = [];
  const first = state.src.slice(pos + 2, max).trim();
  let found = false;
  let line = startLine;

  if (first.endsWith("$$")) {
    const inner = first.slice(0, -2).trim();
    if (inner) lines.push(inner);
    found = true;
  } else if (first) {
    lines.push(first);
  }

  while (!found) {
    line++;
    if (line >= endLine) break;
    pos = state.bMarks[line] + state.tShift[line];
    max = state.eMarks[line];
    if (pos < max && state.sCount[line] < state.blkIndent) break;

    const text = state.src.slice(pos, max).trim();
    if (text.endsWith("$$")) {
      const inner = text.slice(0, -2).trim();
      if (inner) lines.push(inner);
      found = true;
    } else {
      lines.push(text);
    }
  }

  // unterminated: let the paragraph rule have it
  if (!found) return false;

  state.line = line + 1;
  const token = state.push("math_block", "math", 0);
  token.block = true;
  token.markup = "$$";
  token.content = lines.join("\n");
  token.map = [startLine, state.line];
  return true;
}

/**
 * Keeps TeX away from the markdown parser so that MathJax sees it verbatim.
 */
export function mathPlugin(md: MarkdownIt): void {
  md.inline.ruler.after("escape", "math_inline", mathInline);
  md.block.ruler.before("fence", "math_block", mathBlock, {
    alt: ["paragraph", "reference", "blockquote", "list"],
  });

  md.renderer.rules.math_inline = (tokens, idx, _options, env) => {
    if (isMarkdownEnv(env)) env.hasMath = true;
    return `<span class="math inline">\\(${md.utils.escapeHtml(tokens[idx].content)}\\)</span>`;
  };
  md.renderer.rules.math_block = (tokens, idx, _options, env) => {
    if (isMarkdownEnv(env)) env.hasMath = true;
    return `<div class="math display">\\[${md.utils.escapeHtml(tokens[idx].content)}\\]</div>\n`;
  };
}
