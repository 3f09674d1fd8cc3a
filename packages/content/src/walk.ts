import { readdir } from "node:fs/promises";
import { join } from "node:path";

const isHidden = (name: string): boolean => name.startsWith(".") || name.startsWith("_");

/**
 * List files under `dir` as sorted posix paths relative to it.
 * Dotfiles and `_`-prefixed entries are skipped, as are their children.
 */
export async function collectFiles(
  dir: string,
  filter: (relativePath: string) => boolean = () => true,
  basePath = "",
): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (isHidden(entry.name)) continue;
    const relativePath = basePath ? `${basePath}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(join(dir, entry.name), filter, relativePath)));
    } else if (entry.isFile() && filter(relativePath)) {
      files.push(relativePath);
    }
  }

  return files;
}
