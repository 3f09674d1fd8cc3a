import { describe, expect, it } from "vitest";
import {
  BuildError,
  ErrorCodes,
  createBuildError,
  formatDiagnostic,
  isBuildError,
} from "../src";

describe("shared/errors", () => {
  it("createBuildError builds a prefixed message with the location", () => {
    const err = createBuildError(ErrorCodes.BROKEN_LINK, { file: "a.md", line: 3 }, "x.md");
    expect(err).toBeInstanceOf(BuildError);
    expect(err.code).toBe(ErrorCodes.BROKEN_LINK);
    expect(err.loc).toEqual({ file: "a.md", line: 3 });
    expect(err.message).toBe("[scaling-book] Broken link: x.md (a.md:3)");
  });

  it("omits what is not given", () => {
    expect(createBuildError(ErrorCodes.BUILD_FAILED).message).toBe("[scaling-book] Build failed");
    expect(createBuildError(ErrorCodes.CONTENT_DIR_NOT_FOUND, { file: "content" }).message).toBe(
      "[scaling-book] Content directory not found (content)",
    );
  });

  it("keeps the cause and diagnostics", () => {
    const cause = new Error("boom");
    const diagnostics = [
      { code: ErrorCodes.MISSING_PAGE, severity: "error" as const, message: "a.html" },
    ];
    const err = createBuildError(ErrorCodes.BUILD_FAILED, undefined, "1 error(s)", {
      diagnostics,
      cause,
    });
    expect(err.cause).toBe(cause);
    expect(err.diagnostics).toEqual(diagnostics);
  });

  it("formatDiagnostic", () => {
    expect(
      formatDiagnostic({
        code: ErrorCodes.MISSING_ANCHOR,
        severity: "warning",
        message: "#nope",
        loc: { file: "a.md", line: 2 },
      }),
    ).toBe("a.md:2: Missing anchor: #nope");
    expect(
      formatDiagnostic({ code: ErrorCodes.MISSING_PAGE, severity: "error", message: "a.html" }),
    ).toBe("Chapter produced no page: a.html");
  });

  it("isBuildError", () => {
    expect(isBuildError(createBuildError(ErrorCodes.INVALID_CONFIG))).toBe(true);
    expect(isBuildError(new Error("plain"))).toBe(false);
  });
});
