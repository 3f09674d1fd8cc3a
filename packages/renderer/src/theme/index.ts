import { createSSRApp, h } from "vue";
import { renderToString } from "vue/server-renderer";
import { Layout, type PageData } from "./Layout";

export type { PageData, PageLink, SidebarLink } from "./Layout";
export { Layout } from "./Layout";

export async function renderDocument(page: PageData): Promise<string> {
  const app = createSSRApp({ render: () => h(Layout, { page }) });
  return `<!DOCTYPE html>\n${await renderToString(app)}\n`;
}
