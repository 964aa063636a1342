import { ValidationError } from "../errors";
import type { Task } from "../types";
import type { Repositories } from "../store/types";

export const MAX_TAGS_PER_TASK = 10;

export type TagOperation =
  | { kind: "replace"; tagIds: string[] }
  | { kind: "add"; tagIds: string[] }
  | { kind: "remove"; tagId: string };

export interface TagSyncResult {
  tagIds: string[];
  /** False when the operation left the association rows untouched. */
  changed: boolean;
}

const unique = (ids: readonly string[]): string[] => [...new Set(ids)];

/**
 * Keeps a task's tag set a subset of the tags its owner holds. Callers run
 * `apply` inside the same transaction as the task write that triggered it.
 */
export class TagAssociationManager {
  async validate(repos: Repositories, ownerId: string, tagIds: readonly string[]): Promise<void> {
    const wanted = unique(tagIds);
    if (wanted.length === 0) return;

    const owned = new Set((await repos.tags.findManyOwned(ownerId, wanted)).map((t) => t.id));
    const invalidTagIds = wanted.filter((id) => !owned.has(id));
    if (invalidTagIds.length > 0) {
      throw new ValidationError("Unknown tag ids", { invalidTagIds });
    }
  }

  async apply(repos: Repositories, task: Task, operation: TagOperation): Promise<TagSyncResult> {
    const current = await repos.taskTags.tagIdsFor(task.id);

    if (operation.kind === "remove") {
      if (!current.includes(operation.tagId)) {
        return { tagIds: current, changed: false };
      }
      await repos.taskTags.remove(task.id, [operation.tagId]);
      return { tagIds: current.filter((id) => id !== operation.tagId), changed: true };
    }

    const requested = unique(operation.tagIds);
    await this.validate(repos, task.ownerId, requested);

    const next = operation.kind === "replace" ? requested : unique([...current, ...requested]);
    if (next.length > MAX_TAGS_PER_TASK) {
      throw new ValidationError(`A task can carry at most ${MAX_TAGS_PER_TASK} tags`, {
        requested: next.length,
      });
    }

    const toAdd = next.filter((id) => !current.includes(id));
    const toRemove = current.filter((id) => !next.includes(id));
    await repos.taskTags.remove(task.id, toRemove);
    await repos.taskTags.add(task.ownerId, task.id, toAdd);
    return { tagIds: next, changed: toAdd.length > 0 || toRemove.length > 0 };
  }
}
