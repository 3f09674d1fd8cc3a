import { type CAC, cac } from "cac";
import {
  DEFAULT_PORT,
  auditAssets,
  build,
  check,
  formatAssetReport,
  hasErrors,
  serve,
} from "@scaling-book/builder";
import {
  ErrorCodes,
  type LogLevel,
  type Logger,
  createBookLogger,
  createBuildError,
  isBuildError,
  isLogLevel,
  isString,
} from "@scaling-book/shared";

export interface GlobalCliOptions {
  config?: string;
  logLevel?: string;
}

export interface BuildCliOptions extends GlobalCliOptions {
  outDir?: string;
  base?: string;
  clean?: boolean;
}

export interface ServeCliOptions extends BuildCliOptions {
  port?: number | string;
  host?: string | boolean;
  open?: boolean;
}

function resolveLogLevel(value: unknown): LogLevel {
  return isLogLevel(value) ? value : "info";
}

export function resolvePort(value: unknown): number {
  if (value === undefined) return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw createBuildError(
      ErrorCodes.INVALID_OPTION,
      undefined,
      `--port must be a number between 1 and 65535, got ${String(value)}`,
    );
  }
  return port;
}

function buildOptions(options: BuildCliOptions, logger: Logger) {
  return {
    configFile: isString(options.config) ? options.config : undefined,
    outDir: isString(options.outDir) ? options.outDir : undefined,
    base: isString(options.base) ? options.base : undefined,
    clean: options.clean,
    logger,
  };
}

/**
 * Run a command, turning build errors into log lines and a failing exit code.
 */
async function run(logger: Logger, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (e) {
    if (!isBuildError(e)) throw e;
    logger.error(e.message);
    process.exitCode = 1;
  }
}

export function createCli(): CAC {
  const cli = cac("scaling-book");

  cli
    .option("-c, --config <file>", "[string] use the given site config file")
    .option("-l, --log-level <level>", "[string] info | warn | error | silent");

  cli
    .command("build [root]", "build the site for publishing")
    .option("--out-dir <dir>", "[string] output directory, relative to the root")
    .option("--base <path>", "[string] public base path")
    .option("--no-clean", "[boolean] keep files the build no longer produces")
    .action(async (root: string | undefined, options: BuildCliOptions) => {
      const logger = createBookLogger(resolveLogLevel(options.logLevel));
      await run(logger, async () => {
        await build(root ?? ".", buildOptions(options, logger));
      });
    });

  cli
    .command("serve [root]", "build the site and serve the output")
    .option("--out-dir <dir>", "[string] output directory, relative to the root")
    .option("--base <path>", "[string] public base path")
    .option("--port <port>", `[number] port (default ${DEFAULT_PORT})`)
    .option("--host [host]", "[string] listen on all addresses, or on the given one")
    .option("--open", "[boolean] open the site in the browser")
    .action(async (root: string | undefined, options: ServeCliOptions) => {
      const logLevel = resolveLogLevel(options.logLevel);
      const logger = createBookLogger(logLevel);
      await run(logger, async () => {
        await serve(root ?? ".", {
          ...buildOptions(options, logger),
          logLevel,
          port: resolvePort(options.port),
          host: options.host,
          open: options.open,
        });
      });
    });

  cli
    .command("check [root]", "render the site in memory and report broken links and images")
    .action(async (root: string | undefined, options: GlobalCliOptions) => {
      const logger = createBookLogger(resolveLogLevel(options.logLevel));
      await run(logger, async () => {
        const { result, diagnostics } = await check(root ?? ".", buildOptions(options, logger));
        if (hasErrors(diagnostics)) {
          process.exitCode = 1;
          return;
        }
        logger.info(`${result.pages.length} pages checked, ${diagnostics.length} warnings`);
      });
    });

  cli
    .command("assets [root]", "list which assets are referenced and which are unused")
    .action(async (root: string | undefined, options: GlobalCliOptions) => {
      const logger = createBookLogger(resolveLogLevel(options.logLevel));
      await run(logger, async () => {
        const report = await auditAssets(root ?? ".", {
          configFile: isString(options.config) ? options.config : undefined,
        });
        logger.info(formatAssetReport(report));
      });
    });

  cli.help();
  return cli;
}
