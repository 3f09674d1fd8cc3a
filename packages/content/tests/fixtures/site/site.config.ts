import { defineConfig } from "../../../src";

export default defineConfig({
  title: "Fixture Book",
  description: "A book used by the config tests",
  base: "book",
  themeConfig: {
    nav: [{ text: "Home", link: "/" }],
    footer: "Footer",
  },
  markdown: { mermaid: false },
});
