import { posix, sep } from "node:path";

export function toPosixPath(p: string): string {
  return sep === "/" ? p : p.split(sep).join("/");
}

/**
 * Normalize a public base path so that it always starts and ends with `/`.
 */
export function normalizeBase(base: string | undefined): string {
  if (!base) return "/";
  let b = base.trim();
  if (!b.startsWith("/")) b = `/${b}`;
  if (!b.endsWith("/")) b = `${b}/`;
  return b.replace(/\/{2,}/g, "/");
}

export function isExternalUrl(href: string): boolean {
  return /^[a-z][a-z\d+.-]*:/i.test(href) || href.startsWith("//");
}

export function splitFragment(href: string): { path: string; fragment: string } {
  const hashIndex = href.indexOf("#");
  const withoutHash = hashIndex === -1 ? href : href.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? "" : href.slice(hashIndex + 1);
  const queryIndex = withoutHash.indexOf("?");
  return {
    path: queryIndex === -1 ? withoutHash : withoutHash.slice(0, queryIndex),
    fragment,
  };
}

/**
 * Output path (relative to the output directory) -> public URL.
 * `index.html` pages are addressed by their directory.
 */
export function toPublicUrl(base: string, outputPath: string): string {
  const url = outputPath === "index.html" || outputPath.endsWith("/index.html")
    ? outputPath.slice(0, -"index.html".length)
    : outputPath;
  return base + url;
}

/**
 * Map a site path to the file that serves it: directories resolve to their
 * `index.html`, extension-less paths to `.html`.
 */
export function toOutputFile(sitePath: string): string {
  if (sitePath === "" || sitePath.endsWith("/")) return `${sitePath}index.html`;
  if (posix.extname(sitePath) === "") return `${sitePath}.html`;
  return sitePath;
}
