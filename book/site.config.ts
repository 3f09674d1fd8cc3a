import { defineConfig } from "@scaling-book/content";

export default defineConfig({
  title: "How to Scale Your Model",
  description:
    "A systems view of training and serving large language models on accelerator clusters: " +
    "rooflines, sharding, collectives and the arithmetic that ties them together.",
  lang: "en",
  base: "/scaling-book/",
  srcDir: "content",
  assetsDir: "assets",
  outDir: "dist",
  styles: ["theme/main.css"],
  themeConfig: {
    nav: [
      { text: "Start Reading", link: "/01-rooflines.html" },
      { text: "Training", link: "/05-training.html" },
      { text: "Inference", link: "/06-inference.html" },
    ],
    footer: "Text licensed under CC BY 4.0. Code samples licensed under Apache 2.0.",
  },
  markdown: {
    math: true,
    mermaid: true,
  },
});
