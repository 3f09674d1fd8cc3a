import type MarkdownIt from "markdown-it";

export type CoreRule = Parameters<MarkdownIt["core"]["ruler"]["push"]>[1];
export type StateCore = Parameters<CoreRule>[0];
export type Token = StateCore["tokens"][number];

export type InlineRule = Parameters<MarkdownIt["inline"]["ruler"]["after"]>[2];
export type StateInline = Parameters<InlineRule>[0];

export type BlockRule = Parameters<MarkdownIt["block"]["ruler"]["before"]>[2];
export type StateBlock = Parameters<BlockRule>[0];
