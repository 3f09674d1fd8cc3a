import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ErrorCodes } from "@scaling-book/shared";
import { afterEach, describe, expect, it } from "vitest";
import { findConfigFile, resolveConfig, validateUserConfig } from "../src";

const fixtureRoot = fileURLToPath(new URL("./fixtures/site", import.meta.url));

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

const roots: string[] = [];

async function createRoot(): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "scaling-book-config-"));
  roots.push(root);
  return root;
}

afterEach(async () => {
  await Promise.all(roots.splice(0).map((root) => rm(root, { recursive: true, force: true })));
});

describe("content/config", () => {
  it("loads and resolves site.config.ts", async () => {
    const configFile = join(fixtureRoot, "site.config.ts");
    expect(findConfigFile(fixtureRoot)).toBe(configFile);

    const config = await resolveConfig(fixtureRoot);
    expect(config.configFile).toBe(configFile);
    expect(config.title).toBe("Fixture Book");
    expect(config.description).toBe("A book used by the config tests");
    expect(config.base).toBe("/book/");
    expect(config.themeConfig.nav).toEqual([{ text: "Home", link: "/" }]);
    expect(config.themeConfig.footer).toBe("Footer");
    expect(config.markdown).toEqual({ math: true, mermaid: false });
  });

  it("lets overrides win over the config file", async () => {
    const config = await resolveConfig(fixtureRoot, { overrides: { base: "/", outDir: "out" } });
    expect(config.base).toBe("/");
    expect(config.outDir).toBe(resolve(fixtureRoot, "out"));
  });

  it("applies defaults", async () => {
    const root = await createRoot();
    const config = await resolveConfig(root, { configFile: false, overrides: { title: "T" } });
    expect(config).toEqual({
      root,
      configFile: undefined,
      title: "T",
      description: undefined,
      lang: "en",
      base: "/",
      srcDir: resolve(root, "content"),
      assetsDir: resolve(root, "assets"),
      outDir: resolve(root, "dist"),
      styles: [],
      themeConfig: {},
      markdown: { math: true, mermaid: true },
    });
  });

  it("picks up the default stylesheet when it exists", async () => {
    const root = await createRoot();
    await mkdir(join(root, "theme"));
    await writeFile(join(root, "theme/main.css"), "body {}\n");
    const config = await resolveConfig(root, { configFile: false, overrides: { title: "T" } });
    expect(config.styles).toEqual([resolve(root, "theme/main.css")]);
  });

  it("rejects a listed stylesheet that does not exist", async () => {
    const root = await createRoot();
    await expect(
      resolveConfig(root, { configFile: false, overrides: { title: "T", styles: ["missing.css"] } }),
    ).rejects.toMatchObject({ code: ErrorCodes.STYLE_NOT_FOUND });
  });

  it("requires a config file or a title", async () => {
    const root = await createRoot();
    await expect(resolveConfig(root)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_NOT_FOUND });
    await expect(resolveConfig(root, { configFile: "nope.config.ts" })).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_NOT_FOUND,
    });
  });

  it("refuses an output directory that contains the sources", async () => {
    const root = await createRoot();
    for (const outDir of [".", ".."]) {
      await expect(
        resolveConfig(root, { configFile: false, overrides: { title: "T", outDir } }),
      ).rejects.toMatchObject({ code: ErrorCodes.INVALID_CONFIG });
    }
  });

  it("refuses an output directory inside the content or assets", async () => {
    const root = await createRoot();
    for (const outDir of ["assets/out", "content/out"]) {
      await expect(
        resolveConfig(root, { configFile: false, overrides: { title: "T", outDir } }),
      ).rejects.toMatchObject({
        code: ErrorCodes.INVALID_CONFIG,
        message: '[scaling-book] Invalid site config: "outDir" must not be inside the content or assets',
      });
    }
  });

  describe("validateUserConfig", () => {
    it("accepts a complete config", () => {
      expect(
        validateUserConfig(
          {
            title: "T",
            lang: "fr",
            styles: ["a.css"],
            themeConfig: { nav: [{ text: "A", link: "/a" }], repository: "https://example.com" },
            markdown: { math: false },
          },
          "site.config.ts",
        ),
      ).toEqual({
        title: "T",
        description: undefined,
        lang: "fr",
        base: undefined,
        srcDir: undefined,
        assetsDir: undefined,
        outDir: undefined,
        styles: ["a.css"],
        themeConfig: {
          nav: [{ text: "A", link: "/a" }],
          footer: undefined,
          repository: "https://example.com",
        },
        markdown: { math: false, mermaid: undefined },
      });
    });

    it("names the offending key", () => {
      expect(errorOf(() => validateUserConfig({ title: 1 }, "site.config.ts"))).toMatchObject({
        code: ErrorCodes.INVALID_CONFIG,
        message: '[scaling-book] Invalid site config: "title" must be a string (site.config.ts)',
      });
      expect(
        errorOf(() =>
          validateUserConfig({ title: "T", themeConfig: { nav: [{ text: "A" }] } }, "site.config.ts"),
        ),
      ).toMatchObject({
        message:
          '[scaling-book] Invalid site config: "themeConfig.nav[0]" must be { text, link } (site.config.ts)',
      });
      expect(
        errorOf(() => validateUserConfig({ title: "T", markdown: { math: "yes" } }, "site.config.ts")),
      ).toMatchObject({
        message: '[scaling-book] Invalid site config: "markdown.math" must be a boolean (site.config.ts)',
      });
    });

    it("rejects a non-object export", () => {
      expect(errorOf(() => validateUserConfig("nope", "site.config.ts"))).toMatchObject({
        code: ErrorCodes.INVALID_CONFIG,
      });
    });
  });
});
