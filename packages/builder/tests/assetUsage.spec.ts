import { type Asset, parseChapter } from "@scaling-book/content";
import { afterEach, describe, expect, it } from "vitest";
import { analyzeAssetUsage, assetPatterns, auditAssets, formatAssetReport } from "../src";
import { createBook, removeBooks } from "./utils";

function asset(relativePath: string, size: number): Asset {
  return {
    relativePath,
    sourcePath: `/site/assets/${relativePath}`,
    outputPath: `assets/${relativePath}`,
    url: `/assets/${relativePath}`,
    size,
  };
}

const assets = [
  asset("fonts/book.woff2", 5000),
  asset("img/hero.png", 2048),
  asset("img/old-diagram.png", 1234),
  asset("img/responsive.jpg", 300),
  asset("img/roofline.svg", 100),
];

const chapters = [
  parseChapter(
    "01-a.md",
    "/site/content/01-a.md",
    '![r](/assets/img/roofline.svg)\n\n{% include figure.liquid path="assets/img/responsive" %}\n',
    "/",
  ),
  parseChapter("02-b.md", "/site/content/02-b.md", "See roofline.svg for the plot.\n", "/"),
];

const theme = [
  { name: "theme/main.css", contents: '.hero { background: url("../assets/img/hero.png"); }\n' },
];

afterEach(removeBooks);

describe("builder/assetUsage", () => {
  it("assetPatterns", () => {
    expect(assetPatterns(asset("img/roofline.svg", 1))).toEqual([
      "assets/img/roofline.svg",
      "/assets/img/roofline.svg",
      "roofline.svg",
      "roofline",
    ]);
    expect(assetPatterns(asset("fonts/book.woff2", 1))).toEqual([
      "assets/fonts/book.woff2",
      "/assets/fonts/book.woff2",
      "book.woff2",
    ]);
  });

  it("splits assets into used and unused", () => {
    const report = analyzeAssetUsage(chapters, assets, theme);
    expect(report.used.map(({ asset, references }) => [asset.relativePath, references])).toEqual([
      ["img/hero.png", { markdown: [], theme: ["theme/main.css"] }],
      ["img/responsive.jpg", { markdown: ["01-a.md"], theme: [] }],
      ["img/roofline.svg", { markdown: ["01-a.md", "02-b.md"], theme: [] }],
    ]);
    expect(report.unused.map((a) => a.relativePath)).toEqual([
      "fonts/book.woff2",
      "img/old-diagram.png",
    ]);
    expect(report.unusedBytes).toBe(6234);
    expect(report.markdownCount).toBe(2);
    expect(report.themeCount).toBe(1);
  });

  it("formats the report", () => {
    expect(formatAssetReport(analyzeAssetUsage(chapters, assets, theme))).toBe(
      [
        "Found 5 assets",
        "Found 2 markdown files",
        "Found 1 theme files",
        "",
        "=".repeat(60),
        "USED ASSETS",
        "=".repeat(60),
        "  img/hero.png",
        "    -> theme: theme/main.css",
        "  img/responsive.jpg",
        "    -> md: 01-a.md",
        "  img/roofline.svg",
        "    -> md: 01-a.md, 02-b.md",
        "",
        "=".repeat(60),
        "UNUSED ASSETS (not referenced anywhere)",
        "=".repeat(60),
        "  fonts/book.woff2 (5,000 bytes)",
        "  img/old-diagram.png (1,234 bytes)",
        "",
        "Total unused: 2 files, 6,234 bytes",
        "Total used: 3 files",
      ].join("\n"),
    );
  });

  it("audits a book on disk", async () => {
    const root = await createBook({
      "content/index.md": "# T\n\n![a](assets/used.svg)\n",
      "assets/used.svg": "<svg/>",
      "assets/orphan.png": "png",
      "theme/main.css": "body {}\n",
    });
    const report = await auditAssets(root, { configFile: false, inlineConfig: { title: "T" } });
    expect(report.used.map(({ asset }) => asset.relativePath)).toEqual(["used.svg"]);
    expect(report.unused.map((a) => a.relativePath)).toEqual(["orphan.png"]);
    expect(report.unusedBytes).toBe(3);
    expect(report.themeCount).toBe(1);
  });
});
