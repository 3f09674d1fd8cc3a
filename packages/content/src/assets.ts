import { existsSync } from "node:fs";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { toPublicUrl } from "@scaling-book/shared";
import type { Asset, SiteConfig } from "./types";
import { collectFiles } from "./walk";

export const ASSETS_OUTPUT_DIR = "assets";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".svg", ".webp"];

export async function loadAssets(config: SiteConfig): Promise<Asset[]> {
  if (!existsSync(config.assetsDir)) return [];

  const assets: Asset[] = [];
  for (const relativePath of await collectFiles(config.assetsDir)) {
    const sourcePath = join(config.assetsDir, relativePath);
    const outputPath = `${ASSETS_OUTPUT_DIR}/${relativePath}`;
    assets.push({
      relativePath,
      sourcePath,
      outputPath,
      url: toPublicUrl(config.base, outputPath),
      size: (await stat(sourcePath)).size,
    });
  }
  return assets;
}

export function isImage(path: string): boolean {
  const lower = path.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}
