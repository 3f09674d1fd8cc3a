import { type PreviewServer, preview } from "vite";
import { type BuildOptions, build } from "./pipeline";

export interface ServeOptions extends BuildOptions {
  port?: number;
  host?: string | boolean;
  open?: boolean;
}

export const DEFAULT_PORT = 4173;

/**
 * Build, then serve the output directory at the configured base.
 */
export async function serve(root: string, options: ServeOptions = {}): Promise<PreviewServer> {
  const { config } = await build(root, options);
  const server = await preview({
    root: config.root,
    base: config.base,
    configFile: false,
    logLevel: options.logLevel,
    build: { outDir: config.outDir },
    preview: {
      port: options.port ?? DEFAULT_PORT,
      host: options.host,
      open: options.open,
    },
  });
  server.printUrls();
  return server;
}
