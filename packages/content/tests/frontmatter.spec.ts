import { ErrorCodes } from "@scaling-book/shared";
import { describe, expect, it } from "vitest";
import { parseFrontmatter } from "../src";

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe("content/frontmatter", () => {
  it("splits front matter from the body", () => {
    const parsed = parseFrontmatter("---\ntitle: Rooflines\norder: 2\n---\n# Body\n", "a.md");
    expect(parsed.frontmatter).toEqual({ title: "Rooflines", order: 2 });
    expect(parsed.body).toBe("# Body\n");
    expect(parsed.bodyLine).toBe(4);
  });

  it("leaves sources without front matter alone", () => {
    const parsed = parseFrontmatter("# Hi\n\ntext\n", "b.md");
    expect(parsed.frontmatter).toEqual({});
    expect(parsed.body).toBe("# Hi\n\ntext\n");
    expect(parsed.bodyLine).toBe(0);
  });

  it("reports malformed YAML with the file", () => {
    const err = errorOf(() => parseFrontmatter("---\ntitle: [unclosed\n---\nbody\n", "bad.md"));
    expect(err).toMatchObject({
      code: ErrorCodes.MALFORMED_FRONTMATTER,
      loc: { file: "bad.md" },
    });
  });

  it("reports the same malformed source every time it is parsed", () => {
    const source = "---\ntitle: [unclosed\n---\n# Body\n";
    for (let i = 0; i < 2; i++) {
      expect(errorOf(() => parseFrontmatter(source, "a.md"))).toMatchObject({
        code: ErrorCodes.MALFORMED_FRONTMATTER,
        loc: { file: "a.md" },
      });
    }
  });
});
