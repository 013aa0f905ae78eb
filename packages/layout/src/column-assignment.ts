import { type MinuteSpan, spansOverlap } from "./overlap";

/**
 * Assign a column to each span using a greedy first-free-column pass.
 *
 * Spans are processed in the order given. Each one takes the lowest column
 * not held by an earlier span it overlaps. This does not always reach the
 * minimum column count, and the result must stay stable, so don't swap in a
 * different coloring.
 *
 * @returns Column index per input position
 */
export function assignColumns(spans: readonly MinuteSpan[]): number[] {
  const columns: number[] = [];

  for (const [i, span] of spans.entries()) {
    const occupied = new Set<number>();
    for (let j = 0; j < i; j++) {
      const earlier = spans[j];
      const column = columns[j];
      if (earlier && column !== undefined && spansOverlap(span, earlier)) {
        occupied.add(column);
      }
    }

    let column = 0;
    while (occupied.has(column)) {
      column++;
    }
    columns.push(column);
  }

  return columns;
}
