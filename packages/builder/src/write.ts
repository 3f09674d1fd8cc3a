import { mkdir, readFile, readdir, rm, rmdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { isObject } from "@scaling-book/shared";
import type { BuildResult } from "./build";

export interface WriteOptions {
  /** Remove output files the build no longer produces. Defaults to `true`. */
  clean?: boolean;
}

export interface WriteReport {
  written: string[];
  unchanged: string[];
  removed: string[];
}

const encoder = new TextEncoder();

function toBytes(contents: string | Uint8Array): Uint8Array {
  return typeof contents === "string" ? encoder.encode(contents) : contents;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.compare(a, b) === 0;
}

function isNotFound(e: unknown): boolean {
  return isObject(e) && e.code === "ENOENT";
}

async function readExisting(file: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(file);
  } catch (e) {
    if (isNotFound(e)) return undefined;
    throw e;
  }
}

/**
 * Write the build to `outDir`. Files whose bytes are already on disk are
 * left untouched, so an unchanged rebuild writes nothing.
 */
export async function writeBuild(
  result: BuildResult,
  outDir: string = result.config.outDir,
  options: WriteOptions = {},
): Promise<WriteReport> {
  const report: WriteReport = { written: [], unchanged: [], removed: [] };
  await mkdir(outDir, { recursive: true });

  for (const file of result.files.values()) {
    const dest = join(outDir, file.path);
    const bytes = toBytes(file.contents);
    const existing = await readExisting(dest);
    if (existing && sameBytes(existing, bytes)) {
      report.unchanged.push(file.path);
      continue;
    }
    await mkdir(dirname(dest), { recursive: true });
    await writeFile(dest, bytes);
    report.written.push(file.path);
  }

  if (options.clean ?? true) {
    for (const path of await listOutputFiles(outDir)) {
      if (result.files.has(path)) continue;
      await rm(join(outDir, path));
      report.removed.push(path);
    }
    await removeEmptyDirs(outDir, false);
  }

  return report;
}

export async function listOutputFiles(dir: string, basePath = ""): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = basePath ? `${basePath}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listOutputFiles(join(dir, entry.name), path)));
    } else {
      files.push(path);
    }
  }
  return files.sort();
}

async function removeEmptyDirs(dir: string, removeSelf: boolean): Promise<boolean> {
  const entries = await readdir(dir, { withFileTypes: true });
  let empty = true;
  for (const entry of entries) {
    if (entry.isDirectory() && (await removeEmptyDirs(join(dir, entry.name), true))) continue;
    empty = false;
  }
  if (empty && removeSelf) {
    await rmdir(dir);
  }
  return empty;
}
