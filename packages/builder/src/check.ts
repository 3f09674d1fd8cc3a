import { relative } from "node:path";
import { type Reference, resolveHref } from "@scaling-book/renderer";
import { type Diagnostic, ErrorCodes, type Severity, toPosixPath } from "@scaling-book/shared";
import type { BuildResult } from "./build";

/**
 * Build-integrity checks over an in-memory build: every chapter has a page,
 * every internal link (nav links in the config included) and image resolves
 * to an output file, and every fragment names an id on its target page.
 */
export function checkBuild(result: BuildResult): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const report = (
    code: ErrorCodes,
    severity: Severity,
    message: string,
    file: string,
    line?: number,
  ) => diagnostics.push({ code, severity, message, loc: { file, line } });

  for (const chapter of result.chapters) {
    if (!result.files.has(chapter.outputPath)) {
      report(ErrorCodes.MISSING_PAGE, "error", chapter.outputPath, chapter.relativePath);
    }
  }

  const anchors = new Map(result.pages.map((page) => [page.outputPath, new Set(page.anchors)]));

  const checkReference = (ref: Reference, file: string) => {
    if (!result.files.has(ref.target)) {
      report(
        ref.kind === "image" ? ErrorCodes.MISSING_IMAGE : ErrorCodes.BROKEN_LINK,
        "error",
        `${ref.href} -> ${ref.target}`,
        file,
        ref.line,
      );
      return;
    }
    const ids = anchors.get(ref.target);
    if (ref.fragment && ids && !ids.has(ref.fragment)) {
      report(ErrorCodes.MISSING_ANCHOR, "warning", ref.href, file, ref.line);
    }
  };

  for (const page of result.pages) {
    for (const ref of page.references) {
      checkReference(ref, page.chapter.relativePath);
    }
  }

  const navFile = navSource(result);
  for (const ref of navReferences(result)) {
    checkReference(ref, navFile);
  }

  return diagnostics.sort(compareDiagnostics);
}

function navSource({ config }: BuildResult): string {
  return config.configFile ? toPosixPath(relative(config.root, config.configFile)) : "themeConfig.nav";
}

/**
 * Nav links are written from the site root, the way the layout resolves them.
 */
function navReferences({ config, chapters }: BuildResult): Reference[] {
  const pages = new Map(chapters.map((chapter) => [chapter.relativePath, chapter.outputPath]));
  const refs: Reference[] = [];
  for (const { link } of config.themeConfig.nav ?? []) {
    const resolved = resolveHref(
      link,
      { relativePath: "", outputPath: "index.html" },
      { base: config.base, pages },
    );
    if (!resolved) continue;
    refs.push({
      kind: resolved.kind === "anchor" ? "anchor" : "link",
      href: link,
      target: resolved.target,
      fragment: resolved.fragment,
      line: undefined,
    });
  }
  return refs;
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileA = a.loc?.file ?? "";
  const fileB = b.loc?.file ?? "";
  if (fileA !== fileB) return fileA < fileB ? -1 : 1;
  return (a.loc?.line ?? 0) - (b.loc?.line ?? 0);
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === "error");
}
