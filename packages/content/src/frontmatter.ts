import matter from "gray-matter";
import { ErrorCodes, createBuildError, isNumber, isObject } from "@scaling-book/shared";

export interface ParsedSource {
  frontmatter: Record<string, unknown>;
  body: string;
  bodyLine: number;
}

export function parseFrontmatter(source: string, file: string): ParsedSource {
  let parsed: matter.GrayMatterFile<string>;
  try {
    // with options gray-matter skips its per-string cache, which also remembers failed parses
    parsed = matter(source, {});
  } catch (e) {
    throw createBuildError(
      ErrorCodes.MALFORMED_FRONTMATTER,
      { file, line: yamlErrorLine(e) },
      e instanceof Error ? e.message.split("\n")[0] : undefined,
      { cause: e },
    );
  }

  const body = parsed.content;
  const head = source.slice(0, source.length - body.length);
  return {
    frontmatter: { ...parsed.data },
    body,
    bodyLine: head.split("\n").length - 1,
  };
}

// js-yaml marks are 0-based and relative to the front matter block, which
// starts with the remainder of the opening `---` line.
function yamlErrorLine(e: unknown): number | undefined {
  if (isObject(e) && isObject(e.mark) && isNumber(e.mark.line)) {
    return e.mark.line + 1;
  }
  return undefined;
}
