import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join, posix } from "node:path";
import {
  ErrorCodes,
  createBuildError,
  isNumber,
  isString,
  titleFromFileName,
  toPublicUrl,
} from "@scaling-book/shared";
import { parseFrontmatter } from "./frontmatter";
import type { Chapter, SiteConfig } from "./types";
import { collectFiles } from "./walk";

export async function loadChapters(config: SiteConfig): Promise<Chapter[]> {
  if (!existsSync(config.srcDir)) {
    throw createBuildError(ErrorCodes.CONTENT_DIR_NOT_FOUND, { file: config.srcDir });
  }

  const files = await collectFiles(config.srcDir, (file) => file.endsWith(".md"));
  const chapters: Chapter[] = [];
  for (const relativePath of files) {
    const sourcePath = join(config.srcDir, relativePath);
    const source = await readFile(sourcePath, "utf-8");
    chapters.push(parseChapter(relativePath, sourcePath, source, config.base));
  }

  return sortChapters(assertUniqueOutputs(chapters));
}

export function parseChapter(
  relativePath: string,
  sourcePath: string,
  source: string,
  base: string,
): Chapter {
  const { frontmatter, body, bodyLine } = parseFrontmatter(source, relativePath);
  const id = relativePath.replace(/\.md$/, "");
  const fileName = posix.basename(id);

  const title = frontmatter.title ?? findFirstHeading(body) ?? titleFromFileName(fileName);
  if (!isString(title)) {
    throw invalidFrontmatter(relativePath, "title", "a string");
  }

  const permalink = frontmatter.permalink;
  if (permalink !== undefined && !isString(permalink)) {
    throw invalidFrontmatter(relativePath, "permalink", "a string");
  }
  const outputPath = permalink === undefined ? `${id}.html` : permalinkToOutputPath(permalink);
  if (outputPath === undefined) {
    throw invalidFrontmatter(relativePath, "permalink", "a path inside the site");
  }

  return {
    id,
    relativePath,
    sourcePath,
    source,
    frontmatter,
    body,
    bodyLine,
    title,
    description: isString(frontmatter.description) ? frontmatter.description : undefined,
    order: resolveOrder(frontmatter.order, fileName, relativePath),
    outputPath,
    url: toPublicUrl(base, outputPath),
  };
}

export function sortChapters(chapters: Chapter[]): Chapter[] {
  return [...chapters].sort((a, b) => {
    if (a.order !== b.order) return a.order < b.order ? -1 : 1;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

/**
 * `/rooflines/` -> `rooflines/index.html`, `/rooflines` -> `rooflines.html`.
 * `undefined` when the permalink climbs out of the output directory.
 */
export function permalinkToOutputPath(permalink: string): string | undefined {
  let p = posix.normalize(permalink.trim().replace(/^\/+/, "") || ".");
  if (p === ".." || p.startsWith("../")) return undefined;
  if (p === "." || p === "./") p = "";
  if (p === "" || p.endsWith("/")) return `${p}index.html`;
  if (p.endsWith(".html")) return p;
  return `${p}.html`;
}

function resolveOrder(value: unknown, fileName: string, file: string): number {
  if (value !== undefined) {
    if (!isNumber(value)) throw invalidFrontmatter(file, "order", "a number");
    return value;
  }
  const prefix = /^(\d+)[-_]/.exec(fileName);
  if (prefix) return Number.parseInt(prefix[1], 10);
  if (fileName === "index") return 0;
  return Number.POSITIVE_INFINITY;
}

function findFirstHeading(body: string): string | undefined {
  let inFence = false;
  for (const line of body.split("\n")) {
    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;
    const match = /^#\s+(.+?)\s*#*\s*$/.exec(line);
    if (match) return match[1];
  }
  return undefined;
}

function assertUniqueOutputs(chapters: Chapter[]): Chapter[] {
  const seen = new Map<string, Chapter>();
  for (const chapter of chapters) {
    const existing = seen.get(chapter.outputPath);
    if (existing) {
      throw createBuildError(
        ErrorCodes.DUPLICATE_OUTPUT,
        { file: chapter.relativePath },
        `${chapter.outputPath} is also produced by ${existing.relativePath}`,
      );
    }
    seen.set(chapter.outputPath, chapter);
  }
  return chapters;
}

function invalidFrontmatter(file: string, key: string, expected: string) {
  return createBuildError(
    ErrorCodes.INVALID_FRONTMATTER,
    { file, line: 1 },
    `"${key}" must be ${expected}`,
  );
}
