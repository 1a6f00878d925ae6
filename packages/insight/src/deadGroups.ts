/**
 * Group dead exports to show where unused code clusters.
 */

import type { DeadExport, DeadExportGroup, DeadGroupBy } from "./model.js";

/**
 * Parent directory of a path, "." for files at the root.
 */
export function parentDirectory(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx > 0 ? path.slice(0, idx) : ".";
}

/**
 * Groups ordered by size (largest first), then key.
 */
export function groupDeadExports(
  items: readonly DeadExport[],
  by: DeadGroupBy
): DeadExportGroup[] {
  const groups = new Map<string, DeadExport[]>();
  for (const item of items) {
    const key = by === "directory" ? parentDirectory(item.file) : item.kind;
    let group = groups.get(key);
    if (!group) {
      group = [];
      groups.set(key, group);
    }
    group.push(item);
  }

  return Array.from(groups, ([key, symbols]) => ({ key, count: symbols.length, symbols })).sort(
    (a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0)
  );
}
