export interface NavItem {
  text: string;
  link: string;
}

export interface ThemeConfig {
  nav?: NavItem[];
  footer?: string;
  /** Link to the book's source, shown in the header. */
  repository?: string;
}

export interface MarkdownOptions {
  /** Protect `$...$` and `$$...$$` from markdown and load MathJax. */
  math?: boolean;
  /** Render ```mermaid fences as diagrams. */
  mermaid?: boolean;
}

export interface UserConfig {
  title: string;
  description?: string;
  lang?: string;
  base?: string;
  srcDir?: string;
  assetsDir?: string;
  outDir?: string;
  styles?: string[];
  themeConfig?: ThemeConfig;
  markdown?: MarkdownOptions;
}

export interface SiteConfig {
  root: string;
  configFile: string | undefined;
  title: string;
  description: string | undefined;
  lang: string;
  base: string;
  srcDir: string;
  assetsDir: string;
  outDir: string;
  /** Absolute paths of the stylesheets that exist. */
  styles: string[];
  themeConfig: ThemeConfig;
  markdown: Required<MarkdownOptions>;
}

export interface Chapter {
  /** Path relative to `srcDir` without `.md`, e.g. `03-sharding`. */
  id: string;
  relativePath: string;
  sourcePath: string;
  source: string;
  frontmatter: Record<string, unknown>;
  body: string;
  /** Number of source lines before the body (front matter included). */
  bodyLine: number;
  title: string;
  description: string | undefined;
  order: number;
  outputPath: string;
  url: string;
}

export interface Asset {
  /** Path relative to `assetsDir`, e.g. `img/roofline.svg`. */
  relativePath: string;
  sourcePath: string;
  outputPath: string;
  url: string;
  size: number;
}

export interface ContentStore {
  config: SiteConfig;
  chapters: Chapter[];
  assets: Asset[];
}
