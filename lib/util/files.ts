import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import { isErrnoException } from './flow';

export interface FileMatcher {
  visitDirectory(name: string): boolean | Promise<boolean>;
  visitFile(name: string): boolean | Promise<boolean>;
}

export async function walkFiles(root: string, matcher: FileMatcher, visitor: (cb: string) => Promise<void>) {
  const absPaths = [path.resolve(root)];
  let absPath: string | undefined;
  while ((absPath = absPaths.pop()) !== undefined) {
    for (const child of await fs.readdir(absPath, { withFileTypes: true })) {
      const absChildPath = path.join(absPath, child.name);
      if (child.isDirectory() && await matcher.visitDirectory(absChildPath)) {
        absPaths.push(absChildPath);
      }
      if ((child.isFile() || child.isSymbolicLink()) && await matcher.visitFile(absChildPath)) {
        await visitor(absChildPath);
      }
    }
  }
}

/**
 * Find all files under a directory whose path ends in the given name
 *
 * The name may carry leading directories (`util/str.c`), which have to match
 * whole path segments. A directory that does not exist contains no files.
 * Results are sorted.
 */
export async function findFilesMatching(root: string, name: string): Promise<string[]> {
  if (!await exists(root, s => s.isDirectory())) { return []; }

  const wanted = name.split(/[\\/]/).join('/');
  const ret = new Array<string>();
  await walkFiles(root, {
    visitDirectory: () => true,
    visitFile: (f) => {
      const rel = path.relative(root, f).split(path.sep).join('/');
      return rel === wanted || rel.endsWith(`/${wanted}`);
    },
  }, async (f) => { ret.push(f); });
  return ret.sort();
}

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.lstat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return false; }
    throw e;
  }
}

/**
 * Last modification time of a file in nanoseconds, or undefined if it does not exist
 */
export async function modificationTime(fileName: string): Promise<bigint | undefined> {
  try {
    return (await fs.stat(fileName, { bigint: true })).mtimeNs;
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return undefined; }
    throw e;
  }
}

/**
 * Create a directory and its parents
 *
 * Returns whether the directory had to be created.
 */
export async function ensureDirectory(dir: string): Promise<boolean> {
  const created = await fs.mkdir(dir, { recursive: true });
  return created !== undefined;
}

export async function readJson(filename: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(filename, { encoding: 'utf-8' }));
  } catch (e) {
    throw new Error(`While reading ${filename}: ${e}`);
  }
}

/**
 * Find the most specific file with the given name up from the starting directory
 */
export async function findFileUp(filename: string, startDir: string): Promise<string | undefined> {
  const ret = await findFilesUp(filename, startDir);
  return ret.pop();
}

/**
 * Find all files with the given name up from the starting directory
 *
 * Returns the most specific file at the end.
 */
export async function findFilesUp(filename: string, startDir: string): Promise<string[]> {
  const ret = new Array<string>();

  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath)) {
      ret.push(fullPath);
    }

    const next = path.dirname(currentDir);
    if (next === currentDir) { break; }
    currentDir = next;
  }

  // Most specific file at the end
  return ret.reverse();
}

export function isProperChildOf(fileName: string, directory: string) {
  if (!directory.endsWith(path.sep)) { directory += path.sep; }
  return fileName.startsWith(directory);
}
