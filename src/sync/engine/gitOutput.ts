/**
 * Parsers for the plumbing output the git engine consumes.
 */

export interface TreeEntry {
  mode: string;
  type: string;
  oid: string;
  path: string;
}

/**
 * `git ls-remote --heads` → branch names, in output order.
 */
export function parseLsRemoteHeads(output: string): string[] {
  const branches: string[] = [];
  for (const line of output.split("\n")) {
    const match = /^[0-9a-f]+\trefs\/heads\/(.+)$/.exec(line.trim());
    if (match) {
      branches.push(match[1]);
    }
  }
  return branches;
}

/**
 * `git ls-tree -r -z` → entries. Each record is `<mode> <type> <oid>\t<path>\0`.
 */
export function parseLsTree(output: string): TreeEntry[] {
  const entries: TreeEntry[] = [];
  for (const record of output.split("\0")) {
    if (!record) continue;
    const tab = record.indexOf("\t");
    if (tab < 0) continue;
    const [mode, type, oid] = record.slice(0, tab).split(" ");
    if (!mode || !type || !oid) continue;
    entries.push({ mode, type, oid, path: record.slice(tab + 1) });
  }
  return entries;
}

export function parseNulList(output: string): string[] {
  return output.split("\0").filter((item) => item.length > 0);
}

export interface MergeTreeOutput {
  tree: string;
  conflictedPaths: string[];
}

/**
 * `git merge-tree --write-tree --name-only --no-messages -z` → the result tree
 * and the (deduplicated) conflicted paths.
 */
export function parseMergeTree(output: string): MergeTreeOutput {
  const [tree = "", ...rest] = output.split(/[\0\n]/).filter((item) => item.length > 0);
  return { tree: tree.trim(), conflictedPaths: [...new Set(rest)] };
}

export interface CatFileObject {
  oid: string;
  type: string;
  content: Buffer;
}

/**
 * `git cat-file --batch` → one object per requested name, in request order.
 * Each object is `<oid> <type> <size>\n<content>\n`; a name git cannot
 * resolve comes back as `<name> missing` and maps to null.
 */
export function parseCatFileBatch(output: Buffer, names: readonly string[]): Map<string, CatFileObject | null> {
  const objects = new Map<string, CatFileObject | null>();
  let offset = 0;

  for (const name of names) {
    const newline = output.indexOf(0x0a, offset);
    if (newline < 0) {
      throw new Error(`cat-file output ended before "${name}"`);
    }
    const header = output.subarray(offset, newline).toString("utf-8");
    offset = newline + 1;

    if (header === `${name} missing` || header === `${name} ambiguous`) {
      objects.set(name, null);
      continue;
    }
    const match = /^([0-9a-f]+) (\S+) (\d+)$/.exec(header);
    if (!match) {
      throw new Error(`Unexpected cat-file header: ${header}`);
    }
    const size = Number(match[3]);
    objects.set(name, { oid: match[1], type: match[2], content: output.subarray(offset, offset + size) });
    offset += size + 1;
  }
  return objects;
}

/**
 * Split `items` into consecutive batches of at most `size`.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
