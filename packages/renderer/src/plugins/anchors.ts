import type MarkdownIt from "markdown-it";
import { slugify } from "@scaling-book/shared";
import { isMarkdownEnv } from "../env";
import type { Token } from "./types";

const textTokens = new Set(["text", "code_inline", "math_inline"]);

function inlineText(token: Token | undefined): string {
  if (!token) return "";
  if (!token.children) return token.content;
  return token.children
    .filter((child) => textTokens.has(child.type))
    .map((child) => child.content)
    .join("");
}

function uniqueSlug(slug: string, used: Set<string>): string {
  let candidate = slug;
  let n = 1;
  while (used.has(candidate)) {
    candidate = `${slug}-${n++}`;
  }
  used.add(candidate);
  return candidate;
}

/**
 * Give every heading an `id` and record it on the env.
 */
export function anchorsPlugin(md: MarkdownIt): void {
  md.core.ruler.push("heading_anchors", (state) => {
    const env = isMarkdownEnv(state.env) ? state.env : undefined;
    const used = new Set<string>();
    const tokens = state.tokens;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (token.type !== "heading_open") continue;

      const text = inlineText(tokens[i + 1]);
      const explicit = token.attrGet("id");
      const id = explicit ?? uniqueSlug(slugify(text) || "section", used);
      if (explicit) used.add(explicit);
      token.attrSet("id", id);

      env?.headings.push({ level: Number(token.tag.slice(1)), id, text });
    }
  });
}
