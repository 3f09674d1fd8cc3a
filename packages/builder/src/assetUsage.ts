import { readFile } from "node:fs/promises";
import { posix, relative } from "node:path";
import { type Asset, type Chapter, type SiteConfig, isImage } from "@scaling-book/content";
import { toPosixPath } from "@scaling-book/shared";

export interface SourceFile {
  name: string;
  contents: string;
}

export interface AssetUsage {
  asset: Asset;
  references: {
    markdown: string[];
    theme: string[];
  };
}

export interface AssetReport {
  used: AssetUsage[];
  unused: Asset[];
  unusedBytes: number;
  markdownCount: number;
  themeCount: number;
}

/**
 * Strings whose presence in a source counts as a reference to the asset:
 * its site path with and without a leading slash, its file name, and for
 * images the bare stem (responsive variants are referenced without extension).
 */
export function assetPatterns(asset: Asset): string[] {
  const fileName = posix.basename(asset.relativePath);
  const patterns = [asset.outputPath, `/${asset.outputPath}`, fileName];
  if (isImage(fileName)) {
    patterns.push(fileName.slice(0, fileName.length - posix.extname(fileName).length));
  }
  return patterns;
}

function referencingFiles(patterns: string[], sources: SourceFile[]): string[] {
  return sources
    .filter((source) => patterns.some((pattern) => source.contents.includes(pattern)))
    .map((source) => source.name);
}

export function analyzeAssetUsage(
  chapters: Chapter[],
  assets: Asset[],
  themeSources: SourceFile[],
): AssetReport {
  const markdown = chapters.map((chapter) => ({
    name: chapter.relativePath,
    contents: chapter.source,
  }));

  const used: AssetUsage[] = [];
  const unused: Asset[] = [];
  for (const asset of assets) {
    const patterns = assetPatterns(asset);
    const references = {
      markdown: referencingFiles(patterns, markdown),
      theme: referencingFiles(patterns, themeSources),
    };
    if (references.markdown.length > 0 || references.theme.length > 0) {
      used.push({ asset, references });
    } else {
      unused.push(asset);
    }
  }

  return {
    used,
    unused,
    unusedBytes: unused.reduce((total, asset) => total + asset.size, 0),
    markdownCount: markdown.length,
    themeCount: themeSources.length,
  };
}

/**
 * Stylesheets and the config file, named relative to the site root.
 */
export async function loadThemeSources(config: SiteConfig): Promise<SourceFile[]> {
  const files = [...config.styles];
  if (config.configFile) files.push(config.configFile);

  const sources: SourceFile[] = [];
  for (const file of files) {
    sources.push({
      name: toPosixPath(relative(config.root, file)),
      contents: await readFile(file, "utf-8"),
    });
  }
  return sources;
}

const RULE = "=".repeat(60);
const formatBytes = (bytes: number): string => bytes.toLocaleString("en-US");

export function formatAssetReport(report: AssetReport): string {
  const lines: string[] = [
    `Found ${report.used.length + report.unused.length} assets`,
    `Found ${report.markdownCount} markdown files`,
    `Found ${report.themeCount} theme files`,
    "",
    RULE,
    "USED ASSETS",
    RULE,
  ];

  for (const { asset, references } of report.used) {
    const summary: string[] = [];
    if (references.markdown.length > 0) {
      summary.push(`md: ${references.markdown.slice(0, 3).join(", ")}`);
    }
    if (references.theme.length > 0) {
      summary.push(`theme: ${references.theme.slice(0, 3).join(", ")}`);
    }
    lines.push(`  ${asset.relativePath}`, `    -> ${summary.join("; ")}`);
  }

  lines.push("", RULE, "UNUSED ASSETS (not referenced anywhere)", RULE);
  for (const asset of report.unused) {
    lines.push(`  ${asset.relativePath} (${formatBytes(asset.size)} bytes)`);
  }

  lines.push(
    "",
    `Total unused: ${report.unused.length} files, ${formatBytes(report.unusedBytes)} bytes`,
    `Total used: ${report.used.length} files`,
  );
  return lines.join("\n");
}
