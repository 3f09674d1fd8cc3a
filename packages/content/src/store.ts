import { loadAssets } from "./assets";
import { loadChapters } from "./chapters";
import type { ContentStore, SiteConfig } from "./types";

export async function loadContentStore(config: SiteConfig): Promise<ContentStore> {
  const [chapters, assets] = await Promise.all([loadChapters(config), loadAssets(config)]);
  return { config, chapters, assets };
}
