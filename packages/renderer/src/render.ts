import type { Chapter, ContentStore, SiteConfig } from "@scaling-book/content";
import { isExternalUrl, toPublicUrl } from "@scaling-book/shared";
import { type Heading, type Reference, createMarkdownEnv } from "./env";
import { type MarkdownRenderer, createMarkdownRenderer } from "./markdown";
import { type PageData, type PageLink, renderDocument } from "./theme";

export interface RenderContext {
  config: SiteConfig;
  chapters: Chapter[];
  md: MarkdownRenderer;
  /** Stylesheet output paths, relative to the output directory. */
  styles: string[];
}

export interface RenderedPage {
  chapter: Chapter;
  outputPath: string;
  html: string;
  references: Reference[];
  headings: Heading[];
  /** Every id a fragment may point at on this page. */
  anchors: string[];
  hasMath: boolean;
  hasMermaid: boolean;
}

export function createRenderContext(store: ContentStore, styles: string[] = []): RenderContext {
  const { config, chapters } = store;
  const pages = new Map(chapters.map((chapter) => [chapter.relativePath, chapter.outputPath]));
  return {
    config,
    chapters,
    styles,
    md: createMarkdownRenderer({
      base: config.base,
      math: config.markdown.math,
      mermaid: config.markdown.mermaid,
      pages,
    }),
  };
}

export function resolveNavLink(base: string, link: string): string {
  if (isExternalUrl(link) || link.startsWith(base)) return link;
  return base + link.replace(/^\/+/, "");
}

function toPageLink(chapter: Chapter | undefined): PageLink | undefined {
  return chapter && { text: chapter.title, href: chapter.url };
}

export async function renderChapter(chapter: Chapter, ctx: RenderContext): Promise<RenderedPage> {
  const { config, chapters } = ctx;
  const env = createMarkdownEnv(chapter);
  const content = ctx.md.render(chapter.body, env);

  const index = chapters.findIndex((c) => c.id === chapter.id);
  const hasTitleHeading = env.headings.some((heading) => heading.level === 1);

  const page: PageData = {
    lang: config.lang,
    title: chapter.title === config.title ? config.title : `${chapter.title} | ${config.title}`,
    heading: hasTitleHeading ? undefined : chapter.title,
    description: chapter.description ?? config.description,
    siteTitle: config.title,
    home: config.base,
    styles: ctx.styles.map((style) => toPublicUrl(config.base, style)),
    nav: (config.themeConfig.nav ?? []).map((item) => ({
      text: item.text,
      href: resolveNavLink(config.base, item.link),
    })),
    repository: config.themeConfig.repository,
    footer: config.themeConfig.footer,
    chapters: chapters.map((c) => ({ text: c.title, href: c.url, active: c.id === chapter.id })),
    prev: index > 0 ? toPageLink(chapters[index - 1]) : undefined,
    next: index >= 0 ? toPageLink(chapters[index + 1]) : undefined,
    content,
    hasMath: env.hasMath,
    hasMermaid: env.hasMermaid,
  };

  return {
    chapter,
    outputPath: chapter.outputPath,
    html: await renderDocument(page),
    references: env.references,
    headings: env.headings,
    anchors: collectAnchors(content),
    hasMath: env.hasMath,
    hasMermaid: env.hasMermaid,
  };
}

/**
 * Ids in the rendered body, headings and raw HTML alike.
 */
export function collectAnchors(html: string): string[] {
  const ids = new Set<string>();
  for (const match of html.matchAll(/\s(?:id|name)="([^"]+)"/g)) {
    ids.add(match[1]);
  }
  return [...ids];
}
