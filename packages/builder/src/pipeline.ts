import { relative } from "node:path";
import {
  type SiteConfig,
  type UserConfig,
  loadContentStore,
  resolveConfig,
} from "@scaling-book/content";
import {
  type Diagnostic,
  ErrorCodes,
  type LogLevel,
  type Logger,
  createBookLogger,
  createBuildError,
  formatDiagnostic,
} from "@scaling-book/shared";
import { type AssetReport, analyzeAssetUsage, loadThemeSources } from "./assetUsage";
import { type BuildResult, buildSite } from "./build";
import { checkBuild, hasErrors } from "./check";
import { type WriteReport, writeBuild } from "./write";

export interface BuildOptions {
  configFile?: string | false;
  /** Merged over the config file; `outDir` and `base` below take precedence. */
  inlineConfig?: Partial<UserConfig>;
  outDir?: string;
  base?: string;
  /** Remove stale files from the output directory. Defaults to `true`. */
  clean?: boolean;
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface CheckOutcome {
  config: SiteConfig;
  result: BuildResult;
  diagnostics: Diagnostic[];
}

export interface BuildOutcome extends CheckOutcome {
  report: WriteReport;
}

function resolveLogger(options: BuildOptions): Logger {
  return options.logger ?? createBookLogger(options.logLevel);
}

export function reportDiagnostics(diagnostics: Diagnostic[], logger: Logger): void {
  for (const diagnostic of diagnostics) {
    const line = formatDiagnostic(diagnostic);
    if (diagnostic.severity === "error") {
      logger.error(line);
    } else {
      logger.warn(line);
    }
  }
}

/**
 * Resolve, load, render and check the site without touching the output
 * directory.
 */
export async function check(root: string, options: BuildOptions = {}): Promise<CheckOutcome> {
  const logger = resolveLogger(options);
  const overrides: Partial<UserConfig> = { ...options.inlineConfig };
  if (options.outDir !== undefined) overrides.outDir = options.outDir;
  if (options.base !== undefined) overrides.base = options.base;
  const config = await resolveConfig(root, { configFile: options.configFile, overrides });
  const store = await loadContentStore(config);
  const result = await buildSite(store);
  const diagnostics = checkBuild(result);
  reportDiagnostics(diagnostics, logger);
  return { config, result, diagnostics };
}

/**
 * Build the site into its output directory. Any error diagnostic aborts the
 * build before anything is written.
 */
export async function build(root: string, options: BuildOptions = {}): Promise<BuildOutcome> {
  const logger = resolveLogger(options);
  const { config, result, diagnostics } = await check(root, { ...options, logger });

  if (hasErrors(diagnostics)) {
    const count = diagnostics.filter((diagnostic) => diagnostic.severity === "error").length;
    throw createBuildError(ErrorCodes.BUILD_FAILED, undefined, `${count} error(s)`, {
      diagnostics,
    });
  }

  const report = await writeBuild(result, config.outDir, { clean: options.clean });
  logger.info(
    `built ${result.pages.length} pages and ${result.files.size - result.pages.length} files ` +
      `into ${relative(process.cwd(), config.outDir) || "."} ` +
      `(${report.written.length} written, ${report.unchanged.length} unchanged, ` +
      `${report.removed.length} removed)`,
  );

  return { config, result, diagnostics, report };
}

/**
 * Which assets are referenced by the chapters, stylesheets or config.
 */
export async function auditAssets(
  root: string,
  options: Pick<BuildOptions, "configFile" | "inlineConfig"> = {},
): Promise<AssetReport> {
  const config = await resolveConfig(root, {
    configFile: options.configFile,
    overrides: options.inlineConfig,
  });
  const store = await loadContentStore(config);
  return analyzeAssetUsage(store.chapters, store.assets, await loadThemeSources(config));
}
