import { posix } from "node:path";
import type MarkdownIt from "markdown-it";
import { isExternalUrl, splitFragment, toOutputFile, toPublicUrl } from "@scaling-book/shared";
import { type MarkdownEnv, type ReferenceKind, isMarkdownEnv } from "../env";
import type { Token } from "./types";

export interface LinksPluginOptions {
  base: string;
  /** Chapter source path (relative to the content directory) -> output path. */
  pages: ReadonlyMap<string, string>;
}

export interface ResolvedHref {
  kind: ReferenceKind;
  target: string;
  fragment: string;
  /** Public URL to write back into the page. */
  url: string;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Resolve an href written in the chapter at `from` to the output file it
 * points at. External URLs resolve to `undefined`.
 *
 * Relative paths are resolved against the chapter's source directory; paths
 * starting with the base or `/` are taken from the site root.
 */
export function resolveHref(
  href: string,
  from: { relativePath: string; outputPath: string },
  options: LinksPluginOptions,
): ResolvedHref | undefined {
  if (isExternalUrl(href)) return undefined;

  const { path: rawPath, fragment: rawFragment } = splitFragment(href);
  const fragment = safeDecode(rawFragment);
  if (rawPath === "") {
    return { kind: "anchor", target: from.outputPath, fragment, url: href };
  }

  const path = safeDecode(rawPath);
  const { base } = options;
  let sitePath: string;
  if (base !== "/" && (path.startsWith(base) || `${path}/` === base)) {
    sitePath = path.slice(base.length);
  } else if (path.startsWith("/")) {
    sitePath = path.slice(1);
  } else {
    sitePath = posix.join(posix.dirname(from.relativePath), path);
  }
  if (sitePath === "." || sitePath === "./") sitePath = "";

  const target = sitePath.endsWith(".md")
    ? (options.pages.get(sitePath) ?? sitePath.replace(/\.md$/, ".html"))
    : toOutputFile(sitePath);

  const url = toPublicUrl(base, target) + (rawFragment ? `#${rawFragment}` : "");
  return { kind: "link", target, fragment, url };
}

function rewrite(
  md: MarkdownIt,
  token: Token,
  attr: "href" | "src",
  kind: "link" | "image",
  env: MarkdownEnv,
  line: number | undefined,
  options: LinksPluginOptions,
): void {
  const href = token.attrGet(attr);
  if (href === null) return;

  const resolved = resolveHref(href, env, options);
  if (!resolved) return;

  env.references.push({
    kind: resolved.kind === "anchor" ? "anchor" : kind,
    href,
    target: resolved.target,
    fragment: resolved.fragment,
    line,
  });
  if (resolved.kind !== "anchor") {
    token.attrSet(attr, md.normalizeLink(resolved.url));
  }
}

/**
 * Rewrite links and image sources to public URLs and record every internal
 * reference on the env for the integrity checks.
 */
export function linksPlugin(
  md: MarkdownIt,
  options: LinksPluginOptions = { base: "/", pages: new Map() },
): void {
  md.core.ruler.push("resolve_links", (state) => {
    const env = isMarkdownEnv(state.env) ? state.env : undefined;
    if (!env) return;

    for (const block of state.tokens) {
      if (block.type !== "inline" || !block.children) continue;
      const line = block.map ? env.lineOffset + block.map[0] + 1 : undefined;

      for (const token of block.children) {
        if (token.type === "link_open") {
          rewrite(md, token, "href", "link", env, line, options);
        } else if (token.type === "image") {
          rewrite(md, token, "src", "image", env, line, options);
        }
      }
    }
  });
}
