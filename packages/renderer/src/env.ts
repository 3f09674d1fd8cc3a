import { isArray, isObject, isString } from "@scaling-book/shared";

export type ReferenceKind = "link" | "image" | "anchor";

export interface Reference {
  kind: ReferenceKind;
  /** The href or src as written by the author. */
  href: string;
  /** Output file the reference points at, relative to the output directory. */
  target: string;
  fragment: string;
  line: number | undefined;
}

export interface Heading {
  level: number;
  id: string;
  text: string;
}

export interface MarkdownEnv {
  /** Chapter source path, relative to the content directory. */
  relativePath: string;
  outputPath: string;
  /** Lines before the markdown body, added to token line numbers. */
  lineOffset: number;
  references: Reference[];
  headings: Heading[];
  hasMath: boolean;
  hasMermaid: boolean;
}

export function createMarkdownEnv(page: {
  relativePath: string;
  outputPath: string;
  bodyLine?: number;
}): MarkdownEnv {
  return {
    relativePath: page.relativePath,
    outputPath: page.outputPath,
    lineOffset: page.bodyLine ?? 0,
    references: [],
    headings: [],
    hasMath: false,
    hasMermaid: false,
  };
}

export function isMarkdownEnv(env: unknown): env is MarkdownEnv {
  return (
    isObject(env) &&
    isString(env.relativePath) &&
    isString(env.outputPath) &&
    isArray(env.references) &&
    isArray(env.headings)
  );
}
