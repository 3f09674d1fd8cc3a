export const MATHJAX_SRC = "https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-mml-chtml.js";

export const MERMAID_INIT = [
  `import mermaid from "https://cdn.jsdelivr.net/npm/mermaid@11/dist/mermaid.esm.min.mjs";`,
  `mermaid.initialize({ startOnLoad: true });`,
].join("\n");
