export type {
  Asset,
  Chapter,
  ContentStore,
  MarkdownOptions,
  NavItem,
  SiteConfig,
  ThemeConfig,
  UserConfig,
} from "./types";
export {
  CONFIG_FILES,
  defineConfig,
  findConfigFile,
  loadUserConfig,
  resolveConfig,
  validateUserConfig,
  type ResolveConfigOptions,
} from "./config";
export { parseFrontmatter, type ParsedSource } from "./frontmatter";
export { loadChapters, parseChapter, permalinkToOutputPath, sortChapters } from "./chapters";
export { ASSETS_OUTPUT_DIR, IMAGE_EXTENSIONS, isImage, loadAssets } from "./assets";
export { loadContentStore } from "./store";
export { collectFiles } from "./walk";
