import { assignColumns } from "./column-assignment";
import { type MinuteSpan, toMinuteSpan } from "./overlap";
import { countGroupColumns, findOverlapGroups } from "./overlap-groups";
import type { TimeScale } from "./time-scale";
import type { Placement, TimedEvent } from "./types";

/**
 * Working record for one event while columns and groups are resolved.
 */
interface MutableLayout<T extends TimedEvent> {
  event: T;
  span: MinuteSpan;
  columnIndex: number;
  totalColumns: number;
}

function toPlacement<T extends TimedEvent>(
  layout: MutableLayout<T>,
  scale: TimeScale
): Placement<T> {
  const horizontalExtent = 1 / layout.totalColumns;
  return Object.freeze({
    event: layout.event,
    verticalOffset: scale.toExtent(layout.span.startMinute),
    verticalExtent: scale.toExtent(
      layout.span.endMinute - layout.span.startMinute
    ),
    horizontalOffset: layout.columnIndex * horizontalExtent,
    horizontalExtent,
    columnIndex: layout.columnIndex,
    totalColumns: layout.totalColumns,
  });
}

/**
 * Calculate placements for all events of a single day.
 *
 * Events are laid out in the order given; callers wanting chronological
 * columns sort first (see groupEventsByDay). Each overlap group is sized
 * independently, so an event that overlaps nothing gets the full width.
 * Output is grouped by overlap group rather than following input order.
 *
 * @param events - One day's events
 * @param scale - Maps time of day to vertical offsets
 */
export function calculateEventLayouts<T extends TimedEvent>(
  events: readonly T[],
  scale: TimeScale
): Placement<T>[] {
  if (events.length === 0) {
    return [];
  }

  const spans = events.map(toMinuteSpan);
  const columns = assignColumns(spans);
  const layouts: MutableLayout<T>[] = events.map((event, i) => ({
    event,
    span: spans[i] ?? toMinuteSpan(event),
    columnIndex: columns[i] ?? 0,
    totalColumns: 1,
  }));

  const placements: Placement<T>[] = [];
  for (const group of findOverlapGroups(spans)) {
    const totalColumns = countGroupColumns(group, columns);
    for (const index of group) {
      const layout = layouts[index];
      if (!layout) {
        continue;
      }
      layout.totalColumns = totalColumns;
      placements.push(toPlacement(layout, scale));
    }
  }

  return placements;
}
