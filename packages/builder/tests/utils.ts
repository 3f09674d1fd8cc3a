import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export type Tree = Record<string, string>;

const roots: string[] = [];

export async function createBook(files: Tree): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "scaling-book-"));
  roots.push(root);
  await writeTree(root, files);
  return root;
}

export async function writeTree(root: string, files: Tree): Promise<void> {
  for (const [file, contents] of Object.entries(files)) {
    const path = join(root, file);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents);
  }
}

export async function removeBooks(): Promise<void> {
  await Promise.all(roots.splice(0).map((root) => rm(root, { recursive: true, force: true })));
}

export const sampleBook: Tree = {
  "content/index.md": "# Test Book\n\nStart with [the first chapter](01-first.md).\n",
  "content/01-first.md":
    "---\ntitle: First\n---\nSee ![diagram](assets/img/diagram.svg) and [the second](02-second.md#details).\n",
  "content/02-second.md": "---\ntitle: Second\n---\n## Details\n\nBack to [the start](index.md).\n",
  "assets/img/diagram.svg": '<svg xmlns="http://www.w3.org/2000/svg"/>\n',
  "theme/main.css": "body { margin: 0; }\n",
};
