import { NotFoundError } from "../errors";

export type OwnedKind = "task" | "tag";

const LABELS: Record<OwnedKind, string> = {
  task: "Task",
  tag: "Tag",
};

/**
 * Returns `row` when it belongs to `ownerId`. A row owned by someone else is
 * reported exactly like a missing one.
 */
export function assertOwned<T extends { ownerId: string }>(
  row: T | null | undefined,
  ownerId: string,
  kind: OwnedKind
): T {
  if (!row || row.ownerId !== ownerId) {
    throw new NotFoundError(`${LABELS[kind]} not found`);
  }
  return row;
}
