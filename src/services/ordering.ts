import { ValidationError } from "../errors";
import type { PositionChange, TaskStatus } from "../types";

/** Spacing between keys when a partition is appended to or renumbered. */
export const ORDER_SPACING = 1000;

export interface OrderedTask {
  id: string;
  status: TaskStatus;
  position: number;
}

export interface ReorderPlan {
  /** Ids of the target partition in their new order. */
  sequence: string[];
  /** Rows to write; empty when the move changes nothing. */
  changes: PositionChange[];
  renumbered: boolean;
}

export const appendKey = (last: OrderedTask | null): number =>
  last ? last.position + ORDER_SPACING : ORDER_SPACING;

/**
 * Plans a drag-and-drop move of `moved` into `targetStatus` at index
 * `targetPosition` of `partition`, which must hold that partition's rows
 * ascending by position. Keys stay positive integers; a key is picked between
 * the new neighbours while they leave a gap, otherwise the whole partition is
 * respaced.
 */
export function planReorder(
  partition: readonly OrderedTask[],
  moved: OrderedTask,
  targetStatus: TaskStatus,
  targetPosition: number
): ReorderPlan {
  if (!Number.isInteger(targetPosition) || targetPosition < 0) {
    throw new ValidationError("targetPosition must be a non-negative integer", { targetPosition });
  }

  const currentIndex = partition.findIndex((t) => t.id === moved.id);
  const remaining = partition.filter((t) => t.id !== moved.id);
  const index = Math.min(targetPosition, remaining.length);
  const sequence = [...remaining.slice(0, index), moved, ...remaining.slice(index)];
  const ids = sequence.map((t) => t.id);

  if (currentIndex === index && moved.status === targetStatus) {
    return { sequence: ids, changes: [], renumbered: false };
  }

  const lower = index > 0 ? remaining[index - 1].position : 0;
  const upper = index < remaining.length ? remaining[index].position : null;

  if (upper === null) {
    return {
      sequence: ids,
      changes: [{ id: moved.id, status: targetStatus, position: lower + ORDER_SPACING }],
      renumbered: false,
    };
  }

  if (upper - lower >= 2) {
    return {
      sequence: ids,
      changes: [{ id: moved.id, status: targetStatus, position: lower + Math.floor((upper - lower) / 2) }],
      renumbered: false,
    };
  }

  const changes: PositionChange[] = [];
  sequence.forEach((task, i) => {
    const position = (i + 1) * ORDER_SPACING;
    if (task.id === moved.id || task.position !== position) {
      changes.push({ id: task.id, status: targetStatus, position });
    }
  });

  return { sequence: ids, changes, renumbered: true };
}
