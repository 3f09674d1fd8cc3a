import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { Chapter, ContentStore, SiteConfig } from "@scaling-book/content";
import { type RenderedPage, createRenderContext, renderChapter } from "@scaling-book/renderer";
import { ErrorCodes, createBuildError } from "@scaling-book/shared";

export const STYLES_OUTPUT_DIR = "theme";

export interface OutputFile {
  /** Path relative to the output directory. */
  path: string;
  contents: string | Uint8Array;
  /** Absolute path of the input the file was derived from. */
  source: string;
}

export interface BuildResult {
  config: SiteConfig;
  chapters: Chapter[];
  pages: RenderedPage[];
  /** Every output file, ordered by path. */
  files: Map<string, OutputFile>;
}

/**
 * Content store -> in-memory site. Nothing is written.
 */
export async function buildSite(store: ContentStore): Promise<BuildResult> {
  const { config } = store;
  const outputs: OutputFile[] = [];

  const styles = config.styles.map((file) => ({
    path: `${STYLES_OUTPUT_DIR}/${basename(file)}`,
    source: file,
  }));
  const ctx = createRenderContext(store, styles.map((style) => style.path));

  const pages: RenderedPage[] = [];
  for (const chapter of store.chapters) {
    const page = await renderChapter(chapter, ctx);
    pages.push(page);
    outputs.push({ path: page.outputPath, contents: page.html, source: chapter.sourcePath });
  }

  for (const asset of store.assets) {
    outputs.push({
      path: asset.outputPath,
      contents: await readFile(asset.sourcePath),
      source: asset.sourcePath,
    });
  }

  for (const style of styles) {
    outputs.push({ path: style.path, contents: await readFile(style.source), source: style.source });
  }

  return { config, chapters: store.chapters, pages, files: toFileMap(outputs) };
}

function toFileMap(outputs: OutputFile[]): Map<string, OutputFile> {
  const sorted = [...outputs].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const files = new Map<string, OutputFile>();
  for (const file of sorted) {
    const existing = files.get(file.path);
    if (existing) {
      throw createBuildError(
        ErrorCodes.DUPLICATE_OUTPUT,
        { file: file.source },
        `${file.path} is also produced by ${existing.source}`,
      );
    }
    files.set(file.path, file);
  }
  return files;
}
