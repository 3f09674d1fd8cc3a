import { existsSync } from "node:fs";
import { basename, isAbsolute, relative, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  ErrorCodes,
  createBuildError,
  isObject,
  isString,
  isStringArray,
  normalizeBase,
} from "@scaling-book/shared";
import type { MarkdownOptions, NavItem, SiteConfig, ThemeConfig, UserConfig } from "./types";

export const CONFIG_FILES = [
  "site.config.ts",
  "site.config.mts",
  "site.config.js",
  "site.config.mjs",
];

const DEFAULT_STYLES = ["theme/main.css"];

export function defineConfig(config: UserConfig): UserConfig {
  return config;
}

export interface ResolveConfigOptions {
  /** Explicit config file, or `false` to use `overrides` alone. */
  configFile?: string | false;
  overrides?: Partial<UserConfig>;
}

export function findConfigFile(root: string): string | undefined {
  for (const name of CONFIG_FILES) {
    const file = resolve(root, name);
    if (existsSync(file)) return file;
  }
  return undefined;
}

export async function loadUserConfig(file: string): Promise<UserConfig> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(file).href);
  } catch (e) {
    throw createBuildError(ErrorCodes.INVALID_CONFIG, { file }, "failed to load", {
      cause: e,
    });
  }
  const exported = isObject(mod) && "default" in mod ? mod.default : mod;
  return validateUserConfig(exported, file);
}

export async function resolveConfig(
  root: string,
  options: ResolveConfigOptions = {},
): Promise<SiteConfig> {
  const absRoot = resolve(root);
  const configFile =
    options.configFile === false
      ? undefined
      : options.configFile
        ? resolve(absRoot, options.configFile)
        : findConfigFile(absRoot);

  let user: Partial<UserConfig> = {};
  if (configFile) {
    if (!existsSync(configFile)) {
      throw createBuildError(ErrorCodes.CONFIG_NOT_FOUND, { file: configFile });
    }
    user = await loadUserConfig(configFile);
  }

  const merged: Partial<UserConfig> = { ...user, ...stripUndefined(options.overrides ?? {}) };
  const title = merged.title;
  if (!isString(title)) {
    throw createBuildError(
      ErrorCodes.CONFIG_NOT_FOUND,
      { file: absRoot },
      `expected one of ${CONFIG_FILES.join(", ")}`,
    );
  }

  const styles = merged.styles
    ? merged.styles.map((style) => resolveStyle(absRoot, style, configFile))
    : DEFAULT_STYLES.map((style) => resolve(absRoot, style)).filter((file) => existsSync(file));

  const srcDir = resolveDir(absRoot, merged.srcDir ?? "content");
  const assetsDir = resolveDir(absRoot, merged.assetsDir ?? "assets");
  const outDir = resolveDir(absRoot, merged.outDir ?? "dist");
  // the output directory is cleaned on every build, and whatever sits in the
  // content or assets directories is read back in as input
  if (isInside(absRoot, outDir) || isInside(srcDir, outDir) || isInside(assetsDir, outDir)) {
    throw createBuildError(
      ErrorCodes.INVALID_CONFIG,
      configFile ? { file: configFile } : undefined,
      `"outDir" must not contain the site root, content or assets`,
    );
  }
  if (isInside(outDir, srcDir) || isInside(outDir, assetsDir)) {
    throw createBuildError(
      ErrorCodes.INVALID_CONFIG,
      configFile ? { file: configFile } : undefined,
      `"outDir" must not be inside the content or assets`,
    );
  }

  return {
    root: absRoot,
    configFile,
    title,
    description: merged.description,
    lang: merged.lang ?? "en",
    base: normalizeBase(merged.base),
    srcDir,
    assetsDir,
    outDir,
    styles,
    themeConfig: merged.themeConfig ?? {},
    markdown: {
      math: merged.markdown?.math ?? true,
      mermaid: merged.markdown?.mermaid ?? true,
    },
  };
}

function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

function resolveDir(root: string, dir: string): string {
  return isAbsolute(dir) ? dir : resolve(root, dir);
}

function resolveStyle(root: string, style: string, configFile: string | undefined): string {
  const file = resolveDir(root, style);
  if (!existsSync(file)) {
    throw createBuildError(
      ErrorCodes.STYLE_NOT_FOUND,
      configFile ? { file: configFile } : undefined,
      basename(file),
    );
  }
  return file;
}

function stripUndefined(config: Partial<UserConfig>): Partial<UserConfig> {
  const result: Partial<UserConfig> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

// ============================================================================
// Validation
// ============================================================================

function invalid(file: string, key: string, expected: string) {
  return createBuildError(ErrorCodes.INVALID_CONFIG, { file }, `"${key}" must be ${expected}`);
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  file: string,
  prefix = "",
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isString(value)) throw invalid(file, prefix + key, "a string");
  return value;
}

function optionalBoolean(
  raw: Record<string, unknown>,
  key: string,
  file: string,
  prefix = "",
): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw invalid(file, prefix + key, "a boolean");
  return value;
}

function validateNav(value: unknown, file: string): NavItem[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw invalid(file, "themeConfig.nav", "an array");
  return value.map((item, i) => {
    if (!isObject(item) || !isString(item.text) || !isString(item.link)) {
      throw invalid(file, `themeConfig.nav[${i}]`, "{ text, link }");
    }
    return { text: item.text, link: item.link };
  });
}

function validateTheme(value: unknown, file: string): ThemeConfig | undefined {
  if (value === undefined) return undefined;
  if (!isObject(value)) throw invalid(file, "themeConfig", "an object");
  return {
    nav: validateNav(value.nav, file),
    footer: optionalString(value, "footer", file, "themeConfig."),
    repository: optionalString(value, "repository", file, "themeConfig."),
  };
}

function validateMarkdown(value: unknown, file: string): MarkdownOptions | undefined {
  if (value === undefined) return undefined;
  if (!isObject(value)) throw invalid(file, "markdown", "an object");
  return {
    math: optionalBoolean(value, "math", file, "markdown."),
    mermaid: optionalBoolean(value, "mermaid", file, "markdown."),
  };
}

export function validateUserConfig(raw: unknown, file: string): UserConfig {
  if (!isObject(raw)) {
    throw createBuildError(ErrorCodes.INVALID_CONFIG, { file }, "default export must be an object");
  }
  if (!isString(raw.title)) throw invalid(file, "title", "a string");
  let styles: string[] | undefined;
  if (raw.styles !== undefined) {
    if (!isStringArray(raw.styles)) throw invalid(file, "styles", "an array of strings");
    styles = raw.styles;
  }
  return {
    title: raw.title,
    description: optionalString(raw, "description", file),
    lang: optionalString(raw, "lang", file),
    base: optionalString(raw, "base", file),
    srcDir: optionalString(raw, "srcDir", file),
    assetsDir: optionalString(raw, "assetsDir", file),
    outDir: optionalString(raw, "outDir", file),
    styles,
    themeConfig: validateTheme(raw.themeConfig, file),
    markdown: validateMarkdown(raw.markdown, file),
  };
}
