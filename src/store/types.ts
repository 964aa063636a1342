import type {
  PositionChange,
  SortOrder,
  Tag,
  Task,
  TaskPriority,
  TaskStatus,
  User,
} from "../types";

export const TASK_SORT_FIELDS = [
  "createdAt",
  "updatedAt",
  "title",
  "status",
  "priority",
  "dueDate",
  "position",
] as const;
export const TAG_SORT_FIELDS = ["createdAt", "updatedAt", "name"] as const;

export type TaskSortField = (typeof TASK_SORT_FIELDS)[number];
export type TagSortField = (typeof TAG_SORT_FIELDS)[number];

export interface TaskFilters {
  status?: TaskStatus;
  priority?: TaskPriority;
  search?: string;
  /** Only tasks carrying this tag; resolved to ids by the caller. */
  taskIds?: string[];
}

export interface ListOptions<F extends string> {
  skip: number;
  limit: number;
  sortBy: F;
  sortOrder: SortOrder;
}

export type UserPatch = Partial<Pick<User, "displayName" | "avatarUrl" | "passwordHash" | "lastLoginAt" | "updatedAt">>;
export type TaskPatch = Partial<
  Pick<Task, "title" | "description" | "priority" | "dueDate" | "completedAt" | "updatedAt">
>;
export type TagPatch = Partial<Pick<Tag, "name" | "color" | "description" | "updatedAt">>;

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  insert(user: User): Promise<void>;
  update(id: string, patch: UserPatch): Promise<void>;
  delete(id: string): Promise<boolean>;
}

export interface TaskRepository {
  findById(id: string): Promise<Task | null>;
  list(ownerId: string, filters: TaskFilters, options: ListOptions<TaskSortField>): Promise<Task[]>;
  count(ownerId: string, filters: TaskFilters): Promise<number>;
  /** One (owner, status) partition, ascending by position. */
  listPartition(ownerId: string, status: TaskStatus): Promise<Task[]>;
  lastInPartition(ownerId: string, status: TaskStatus): Promise<Task | null>;
  listOverdue(ownerId: string, now: Date, skip: number, limit: number): Promise<Task[]>;
  insert(task: Task): Promise<void>;
  update(id: string, patch: TaskPatch): Promise<void>;
  /**
   * Writes status and position for every change. `completedAt` follows the
   * status; `updatedAt` is set to `now` on every changed row.
   */
  applyPositions(ownerId: string, changes: PositionChange[], now: Date): Promise<void>;
  delete(id: string): Promise<boolean>;
  deleteByOwner(ownerId: string): Promise<number>;
}

export interface TagRepository {
  findById(id: string): Promise<Tag | null>;
  findManyOwned(ownerId: string, ids: string[]): Promise<Tag[]>;
  findByName(ownerId: string, name: string): Promise<Tag | null>;
  list(ownerId: string, search: string | undefined, options: ListOptions<TagSortField>): Promise<Tag[]>;
  count(ownerId: string, search: string | undefined): Promise<number>;
  insert(tag: Tag): Promise<void>;
  update(id: string, patch: TagPatch): Promise<void>;
  delete(id: string): Promise<boolean>;
  deleteByOwner(ownerId: string): Promise<number>;
}

export interface TaskTagRepository {
  tagIdsFor(taskId: string): Promise<string[]>;
  tagIdsForTasks(taskIds: string[]): Promise<Map<string, string[]>>;
  taskIdsFor(tagId: string): Promise<string[]>;
  countByTag(tagId: string): Promise<number>;
  add(ownerId: string, taskId: string, tagIds: string[]): Promise<void>;
  remove(taskId: string, tagIds: string[]): Promise<number>;
  deleteByTask(taskId: string): Promise<number>;
  deleteByTag(tagId: string): Promise<number>;
  deleteByOwner(ownerId: string): Promise<number>;
}

export interface Repositories {
  users: UserRepository;
  tasks: TaskRepository;
  tags: TagRepository;
  taskTags: TaskTagRepository;
}

/**
 * Every unit of work goes through the store: `read` for plain queries,
 * `withTransaction` for anything that writes. A transaction either commits
 * all of its writes or none of them.
 */
export interface DataStore {
  read<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  withTransaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
