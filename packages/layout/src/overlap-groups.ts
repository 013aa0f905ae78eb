import { type MinuteSpan, spansOverlap } from "./overlap";

/**
 * Partition spans into connected components of the overlap graph.
 *
 * Two spans share a group when a chain of pairwise overlaps links them, even
 * if they never overlap each other directly. Groups are keyed by input
 * position and listed in order of their first member; members follow
 * breadth-first discovery order.
 */
export function findOverlapGroups(spans: readonly MinuteSpan[]): number[][] {
  const groups: number[][] = [];
  const visited = new Set<number>();

  for (const [root] of spans.entries()) {
    if (visited.has(root)) {
      continue;
    }

    const group = [root];
    visited.add(root);

    // group doubles as the BFS queue: members pushed below are visited too
    for (const index of group) {
      const current = spans[index];
      if (!current) {
        continue;
      }
      for (const [other, span] of spans.entries()) {
        if (!visited.has(other) && spansOverlap(current, span)) {
          visited.add(other);
          group.push(other);
        }
      }
    }

    groups.push(group);
  }

  return groups;
}

/**
 * Columns a group reserves: one more than the highest column used in it.
 */
export function countGroupColumns(
  group: readonly number[],
  columns: readonly number[]
): number {
  let maxColumn = 0;
  for (const index of group) {
    maxColumn = Math.max(maxColumn, columns[index] ?? 0);
  }
  return maxColumn + 1;
}
