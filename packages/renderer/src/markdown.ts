import MarkdownIt from "markdown-it";
import type { MarkdownEnv } from "./env";
import { anchorsPlugin } from "./plugins/anchors";
import { type LinksPluginOptions, linksPlugin } from "./plugins/links";
import { mathPlugin } from "./plugins/math";
import { mermaidPlugin } from "./plugins/mermaid";

export type MarkdownRenderer = MarkdownIt;

export interface MarkdownRendererOptions {
  base?: string;
  math?: boolean;
  mermaid?: boolean;
  pages?: ReadonlyMap<string, string>;
}

export function createMarkdownRenderer(options: MarkdownRendererOptions = {}): MarkdownRenderer {
  const md = new MarkdownIt({ html: true });

  if (options.math !== false) md.use(mathPlugin);
  if (options.mermaid !== false) md.use(mermaidPlugin);
  md.use(anchorsPlugin);
  md.use<LinksPluginOptions>(linksPlugin, {
    base: options.base ?? "/",
    pages: options.pages ?? new Map(),
  });

  return md;
}

export function renderMarkdown(md: MarkdownRenderer, source: string, env: MarkdownEnv): string {
  return md.render(source, env);
}
