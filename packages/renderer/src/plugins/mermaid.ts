import type MarkdownIt from "markdown-it";
import { isMarkdownEnv } from "../env";

export function mermaidPlugin(md: MarkdownIt): void {
  const fence = md.renderer.rules.fence;

  md.renderer.rules.fence = (tokens, idx, options, env, self) => {
    const token = tokens[idx];
    const lang = token.info.trim().split(/\s+/)[0];
    if (lang === "mermaid") {
      if (isMarkdownEnv(env)) env.hasMermaid = true;
      return `<pre class="mermaid">${md.utils.escapeHtml(token.content)}</pre>\n`;
    }
    return fence ? fence(tokens, idx, options, env, self) : self.renderToken(tokens, idx, options);
  };
}
