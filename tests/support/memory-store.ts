import { ConflictError } from "../../src/errors";
import type {
  DataStore,
  ListOptions,
  Repositories,
  TagPatch,
  TagSortField,
  TaskFilters,
  TaskPatch,
  TaskSortField,
  UserPatch,
} from "../../src/store/types";
import { TASK_PRIORITIES, TASK_STATUSES } from "../../src/types";
import type { PositionChange, SortOrder, Tag, Task, TaskStatus, TaskTag, User } from "../../src/types";

interface State {
  users: Map<string, User>;
  tasks: Map<string, Task>;
  tags: Map<string, Tag>;
  taskTags: TaskTag[];
}

const emptyState = (): State => ({
  users: new Map(),
  tasks: new Map(),
  tags: new Map(),
  taskTags: [],
});

type Sortable = string | number | null;

const sortValue = (value: string | number | Date | null): Sortable =>
  value instanceof Date ? value.getTime() : value;

const compare = (a: Sortable, b: Sortable): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
};

const taskSortValue = (task: Task, field: TaskSortField): Sortable => {
  if (field === "status") return TASK_STATUSES.indexOf(task.status);
  if (field === "priority") return TASK_PRIORITIES.indexOf(task.priority);
  return sortValue(task[field]);
};

const sortAndPage = <T extends { id: string }>(
  rows: T[],
  value: (row: T) => Sortable,
  options: { skip: number; limit: number; sortOrder: SortOrder }
): T[] => {
  const sign = options.sortOrder === "asc" ? 1 : -1;
  return [...rows]
    .sort((a, b) => sign * compare(value(a), value(b)) || compare(a.id, b.id))
    .slice(options.skip, options.skip + options.limit);
};

/**
 * In-process DataStore for tests. It enforces the same unique constraints as
 * the MongoDB indexes and rolls a failed transaction back to its snapshot.
 */
export class MemoryStore implements DataStore {
  state: State = emptyState();
  transactions = 0;
  private writeQueue: Promise<void> = Promise.resolve();

  private assertTaskKeyFree(task: Task): void {
    for (const other of this.state.tasks.values()) {
      if (
        other.id !== task.id &&
        other.ownerId === task.ownerId &&
        other.status === task.status &&
        other.position === task.position
      ) {
        throw new ConflictError("Duplicate value violates a unique constraint");
      }
    }
  }

  private assertTagNameFree(tag: Tag): void {
    for (const other of this.state.tags.values()) {
      if (other.id !== tag.id && other.ownerId === tag.ownerId && other.name === tag.name) {
        throw new ConflictError("Duplicate value violates a unique constraint");
      }
    }
  }

  private putTask(task: Task): void {
    this.assertTaskKeyFree(task);
    this.state.tasks.set(task.id, task);
  }

  private filterTasks(ownerId: string, filters: TaskFilters): Task[] {
    const search = filters.search?.toLowerCase();
    return [...this.state.tasks.values()].filter(
      (t) =>
        t.ownerId === ownerId &&
        (!filters.status || t.status === filters.status) &&
        (!filters.priority || t.priority === filters.priority) &&
        (!filters.taskIds || filters.taskIds.includes(t.id)) &&
        (!search ||
          t.title.toLowerCase().includes(search) ||
          (t.description ?? "").toLowerCase().includes(search))
    );
  }

  private filterTags(ownerId: string, search: string | undefined): Tag[] {
    const needle = search?.toLowerCase();
    return [...this.state.tags.values()].filter(
      (t) => t.ownerId === ownerId && (!needle || t.name.toLowerCase().includes(needle))
    );
  }

  private partition(ownerId: string, status: TaskStatus): Task[] {
    return [...this.state.tasks.values()]
      .filter((t) => t.ownerId === ownerId && t.status === status)
      .sort((a, b) => a.position - b.position);
  }

  private removeAssociations(match: (row: TaskTag) => boolean): number {
    const before = this.state.taskTags.length;
    this.state.taskTags = this.state.taskTags.filter((row) => !match(row));
    return before - this.state.taskTags.length;
  }

  private deleteWhere<T>(rows: Map<string, T>, match: (row: T) => boolean): number {
    let deleted = 0;
    for (const [id, row] of rows) {
      if (match(row)) {
        rows.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  readonly repos: Repositories = {
    users: {
      findById: async (id) => {
        const user = this.state.users.get(id);
        return user ? { ...user } : null;
      },
      findByEmail: async (email) => {
        const user = [...this.state.users.values()].find((u) => u.email === email);
        return user ? { ...user } : null;
      },
      insert: async (user) => {
        if ([...this.state.users.values()].some((u) => u.email === user.email)) {
          throw new ConflictError("Duplicate value violates a unique constraint");
        }
        this.state.users.set(user.id, { ...user });
      },
      update: async (id, patch: UserPatch) => {
        const user = this.state.users.get(id);
        if (user) this.state.users.set(id, { ...user, ...patch });
      },
      delete: async (id) => this.state.users.delete(id),
    },

    tasks: {
      findById: async (id) => {
        const task = this.state.tasks.get(id);
        return task ? { ...task } : null;
      },
      list: async (ownerId, filters, options: ListOptions<TaskSortField>) =>
        sortAndPage(this.filterTasks(ownerId, filters), (t) => taskSortValue(t, options.sortBy), options).map(
          (t) => ({ ...t })
        ),
      count: async (ownerId, filters) => this.filterTasks(ownerId, filters).length,
      listPartition: async (ownerId, status) => this.partition(ownerId, status).map((t) => ({ ...t })),
      lastInPartition: async (ownerId, status) => {
        const last = this.partition(ownerId, status).pop();
        return last ? { ...last } : null;
      },
      listOverdue: async (ownerId, now, skip, limit) =>
        sortAndPage(
          [...this.state.tasks.values()].filter(
            (t) =>
              t.ownerId === ownerId &&
              t.dueDate !== null &&
              t.dueDate < now &&
              t.status !== "done" &&
              t.status !== "archived"
          ),
          (t) => sortValue(t.dueDate),
          { skip, limit, sortOrder: "asc" }
        ).map((t) => ({ ...t })),
      insert: async (task) => {
        this.putTask({ ...task });
      },
      update: async (id, patch: TaskPatch) => {
        const task = this.state.tasks.get(id);
        if (task) this.state.tasks.set(id, { ...task, ...patch });
      },
      applyPositions: async (ownerId, changes: PositionChange[], now) => {
        const owned = changes.flatMap((change) => {
          const task = this.state.tasks.get(change.id);
          return task && task.ownerId === ownerId ? [{ task, change }] : [];
        });
        owned.forEach(({ task }, index) => {
          this.putTask({ ...task, position: -(index + 1) });
        });
        for (const { task, change } of owned) {
          this.putTask({
            ...task,
            status: change.status,
            position: change.position,
            updatedAt: now,
            completedAt: change.status === "done" ? (task.completedAt ?? now) : null,
          });
        }
      },
      delete: async (id) => this.state.tasks.delete(id),
      deleteByOwner: async (ownerId) => this.deleteWhere(this.state.tasks, (t) => t.ownerId === ownerId),
    },

    tags: {
      findById: async (id) => {
        const tag = this.state.tags.get(id);
        return tag ? { ...tag } : null;
      },
      findManyOwned: async (ownerId, ids) =>
        [...this.state.tags.values()].filter((t) => t.ownerId === ownerId && ids.includes(t.id)).map((t) => ({ ...t })),
      findByName: async (ownerId, name) => {
        const tag = [...this.state.tags.values()].find((t) => t.ownerId === ownerId && t.name === name);
        return tag ? { ...tag } : null;
      },
      list: async (ownerId, search, options: ListOptions<TagSortField>) =>
        sortAndPage(this.filterTags(ownerId, search), (t) => sortValue(t[options.sortBy]), options).map((t) => ({
          ...t,
        })),
      count: async (ownerId, search) => this.filterTags(ownerId, search).length,
      insert: async (tag) => {
        this.assertTagNameFree(tag);
        this.state.tags.set(tag.id, { ...tag });
      },
      update: async (id, patch: TagPatch) => {
        const tag = this.state.tags.get(id);
        if (!tag) return;
        const next = { ...tag, ...patch };
        this.assertTagNameFree(next);
        this.state.tags.set(id, next);
      },
      delete: async (id) => this.state.tags.delete(id),
      deleteByOwner: async (ownerId) => this.deleteWhere(this.state.tags, (t) => t.ownerId === ownerId),
    },

    taskTags: {
      tagIdsFor: async (taskId) => this.state.taskTags.filter((r) => r.taskId === taskId).map((r) => r.tagId),
      tagIdsForTasks: async (taskIds) => {
        const byTask = new Map<string, string[]>();
        for (const row of this.state.taskTags) {
          if (!taskIds.includes(row.taskId)) continue;
          byTask.set(row.taskId, [...(byTask.get(row.taskId) ?? []), row.tagId]);
        }
        return byTask;
      },
      taskIdsFor: async (tagId) => this.state.taskTags.filter((r) => r.tagId === tagId).map((r) => r.taskId),
      countByTag: async (tagId) => this.state.taskTags.filter((r) => r.tagId === tagId).length,
      add: async (ownerId, taskId, tagIds) => {
        for (const tagId of tagIds) {
          if (this.state.taskTags.some((r) => r.taskId === taskId && r.tagId === tagId)) {
            throw new ConflictError("Duplicate value violates a unique constraint");
          }
          this.state.taskTags.push({ taskId, tagId, ownerId });
        }
      },
      remove: async (taskId, tagIds) =>
        this.removeAssociations((r) => r.taskId === taskId && tagIds.includes(r.tagId)),
      deleteByTask: async (taskId) => this.removeAssociations((r) => r.taskId === taskId),
      deleteByTag: async (tagId) => this.removeAssociations((r) => r.tagId === tagId),
      deleteByOwner: async (ownerId) => this.removeAssociations((r) => r.ownerId === ownerId),
    },
  };

  private async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const previous = this.writeQueue;
    this.writeQueue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  read<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return work(this.repos);
  }

  withTransaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return this.withWriteLock(async () => {
      const snapshot = structuredClone(this.state);
      try {
        const result = await work(this.repos);
        this.transactions += 1;
        return result;
      } catch (err) {
        this.state = snapshot;
        throw err;
      }
    });
  }

  /** Tasks of one partition as [id, position] pairs, ascending. */
  keys(ownerId: string, status: TaskStatus): Array<[string, number]> {
    return this.partition(ownerId, status).map((t) => [t.id, t.position]);
  }
}
