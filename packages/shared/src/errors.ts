export interface SourceLocation {
  file: string;
  line?: number;
}

export enum ErrorCodes {
  // config
  CONFIG_NOT_FOUND,
  INVALID_CONFIG,
  INVALID_OPTION,

  // content store
  CONTENT_DIR_NOT_FOUND,
  STYLE_NOT_FOUND,
  MALFORMED_FRONTMATTER,
  INVALID_FRONTMATTER,
  DUPLICATE_OUTPUT,

  // integrity
  MISSING_PAGE,
  BROKEN_LINK,
  MISSING_IMAGE,
  MISSING_ANCHOR,

  BUILD_FAILED,
}

export const errorMessages: Record<ErrorCodes, string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: "No site config found",
  [ErrorCodes.INVALID_CONFIG]: "Invalid site config",
  [ErrorCodes.INVALID_OPTION]: "Invalid option",
  [ErrorCodes.CONTENT_DIR_NOT_FOUND]: "Content directory not found",
  [ErrorCodes.STYLE_NOT_FOUND]: "Stylesheet not found",
  [ErrorCodes.MALFORMED_FRONTMATTER]: "Malformed front matter",
  [ErrorCodes.INVALID_FRONTMATTER]: "Invalid front matter",
  [ErrorCodes.DUPLICATE_OUTPUT]: "Two chapters render to the same page",
  [ErrorCodes.MISSING_PAGE]: "Chapter produced no page",
  [ErrorCodes.BROKEN_LINK]: "Broken link",
  [ErrorCodes.MISSING_IMAGE]: "Missing image",
  [ErrorCodes.MISSING_ANCHOR]: "Missing anchor",
  [ErrorCodes.BUILD_FAILED]: "Build failed",
};

export type Severity = "error" | "warning";

export interface Diagnostic {
  code: ErrorCodes;
  severity: Severity;
  message: string;
  loc?: SourceLocation;
}

export function formatLocation(loc: SourceLocation): string {
  return loc.line === undefined ? loc.file : `${loc.file}:${loc.line}`;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const message = `${errorMessages[diagnostic.code]}: ${diagnostic.message}`;
  return diagnostic.loc ? `${formatLocation(diagnostic.loc)}: ${message}` : message;
}

export class BuildError extends Error {
  readonly code: ErrorCodes;
  readonly loc?: SourceLocation;
  readonly diagnostics: Diagnostic[];

  constructor(
    code: ErrorCodes,
    message: string,
    loc?: SourceLocation,
    diagnostics: Diagnostic[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BuildError";
    this.code = code;
    this.loc = loc;
    this.diagnostics = diagnostics;
  }
}

export function createBuildError(
  code: ErrorCodes,
  loc?: SourceLocation,
  detail?: string,
  options?: { diagnostics?: Diagnostic[]; cause?: unknown },
): BuildError {
  let msg = `[scaling-book] ${errorMessages[code]}`;
  if (detail) msg += `: ${detail}`;
  if (loc) msg += ` (${formatLocation(loc)})`;
  return new BuildError(
    code,
    msg,
    loc,
    options?.diagnostics,
    options && "cause" in options ? { cause: options.cause } : undefined,
  );
}

export function isBuildError(err: unknown): err is BuildError {
  return err instanceof BuildError;
}
