export {
  createMarkdownEnv,
  isMarkdownEnv,
  type Heading,
  type MarkdownEnv,
  type Reference,
  type ReferenceKind,
} from "./env";
export {
  createMarkdownRenderer,
  renderMarkdown,
  type MarkdownRenderer,
  type MarkdownRendererOptions,
} from "./markdown";
export { resolveHref, type LinksPluginOptions, type ResolvedHref } from "./plugins/links";
export {
  collectAnchors,
  createRenderContext,
  renderChapter,
  resolveNavLink,
  type RenderContext,
  type RenderedPage,
} from "./render";
export { Layout, renderDocument, type PageData, type PageLink, type SidebarLink } from "./theme";
export { MATHJAX_SRC, MERMAID_INIT } from "./theme/scripts";
