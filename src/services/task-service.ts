import { v4 as uuidv4 } from "uuid";
import type { PageQuery, ReorderInput, TaskCreateInput, TaskListQuery, TaskUpdateInput } from "../schemas";
import type { DataStore, Repositories, TaskPatch } from "../store/types";
import { TASK_STATUSES } from "../types";
import type { PositionChange, Task, TaskStatus, TaskView } from "../types";
import type { BoardEvents } from "./board-events";
import { appendKey, planReorder } from "./ordering";
import { assertOwned } from "./ownership";
import { TagAssociationManager, type TagOperation } from "./tag-associations";
import { toTagSummary, toTaskView } from "./views";

export interface TaskPage {
  tasks: TaskView[];
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
}

export interface ReorderResult {
  task: TaskView;
  changes: PositionChange[];
}

export interface TaskServiceOptions {
  events?: BoardEvents;
  associations?: TagAssociationManager;
  clock?: () => Date;
}

// Past any real column length; planReorder clamps it to "append".
const END_OF_COLUMN = Number.MAX_SAFE_INTEGER;

export class TaskService {
  private readonly events?: BoardEvents;
  private readonly associations: TagAssociationManager;
  private readonly clock: () => Date;

  constructor(
    private readonly store: DataStore,
    options: TaskServiceOptions = {}
  ) {
    this.events = options.events;
    this.associations = options.associations ?? new TagAssociationManager();
    this.clock = options.clock ?? (() => new Date());
  }

  private async hydrate(repos: Repositories, ownerId: string, tasks: Task[]): Promise<TaskView[]> {
    const tagIdsByTask = await repos.taskTags.tagIdsForTasks(tasks.map((t) => t.id));
    const allTagIds = [...new Set([...tagIdsByTask.values()].flat())];
    const tags = new Map((await repos.tags.findManyOwned(ownerId, allTagIds)).map((t) => [t.id, toTagSummary(t)]));

    return tasks.map((task) =>
      toTaskView(
        task,
        (tagIdsByTask.get(task.id) ?? []).flatMap((id) => {
          const tag = tags.get(id);
          return tag ? [tag] : [];
        })
      )
    );
  }

  private async hydrateOne(repos: Repositories, ownerId: string, taskId: string): Promise<TaskView> {
    const task = assertOwned(await repos.tasks.findById(taskId), ownerId, "task");
    const [view] = await this.hydrate(repos, ownerId, [task]);
    return view;
  }

  /** Fails before any transaction opens when a tag id is not the caller's. */
  private async precheckTags(ownerId: string, tagIds: string[] | undefined): Promise<void> {
    if (!tagIds || tagIds.length === 0) return;
    await this.store.read((repos) => this.associations.validate(repos, ownerId, tagIds));
  }

  private async move(
    repos: Repositories,
    task: Task,
    targetStatus: TaskStatus,
    targetPosition: number
  ): Promise<PositionChange[]> {
    const partition = await repos.tasks.listPartition(task.ownerId, targetStatus);
    const plan = planReorder(partition, task, targetStatus, targetPosition);
    await repos.tasks.applyPositions(task.ownerId, plan.changes, this.clock());
    return plan.changes;
  }

  getTask(ownerId: string, taskId: string): Promise<TaskView> {
    return this.store.read((repos) => this.hydrateOne(repos, ownerId, taskId));
  }

  listTasks(ownerId: string, query: TaskListQuery): Promise<TaskPage> {
    return this.store.read(async (repos) => {
      const filters = {
        status: query.status,
        priority: query.priority,
        search: query.search,
        taskIds: query.tagId ? await repos.taskTags.taskIdsFor(query.tagId) : undefined,
      };
      const tasks = await repos.tasks.list(ownerId, filters, query);
      const total = await repos.tasks.count(ownerId, filters);

      return {
        tasks: await this.hydrate(repos, ownerId, tasks),
        total,
        page: Math.floor(query.skip / query.limit) + 1,
        perPage: query.limit,
        totalPages: Math.ceil(total / query.limit),
      };
    });
  }

  /** One board column in display order. */
  listColumn(ownerId: string, status: TaskStatus): Promise<TaskView[]> {
    return this.store.read(async (repos) =>
      this.hydrate(repos, ownerId, await repos.tasks.listPartition(ownerId, status))
    );
  }

  /** Every column, in status order, each in display order. */
  listBoard(ownerId: string): Promise<TaskView[]> {
    return this.store.read(async (repos) => {
      const tasks: Task[] = [];
      for (const status of TASK_STATUSES) {
        tasks.push(...(await repos.tasks.listPartition(ownerId, status)));
      }
      return this.hydrate(repos, ownerId, tasks);
    });
  }

  listOverdue(ownerId: string, query: PageQuery): Promise<TaskView[]> {
    return this.store.read(async (repos) =>
      this.hydrate(repos, ownerId, await repos.tasks.listOverdue(ownerId, this.clock(), query.skip, query.limit))
    );
  }

  async createTask(ownerId: string, input: TaskCreateInput): Promise<TaskView> {
    await this.precheckTags(ownerId, input.tagIds);

    const view = await this.store.withTransaction(async (repos) => {
      const now = this.clock();
      const task: Task = {
        id: uuidv4(),
        ownerId,
        title: input.title,
        description: input.description ?? null,
        status: input.status,
        priority: input.priority,
        dueDate: input.dueDate ?? null,
        completedAt: input.status === "done" ? now : null,
        position: appendKey(await repos.tasks.lastInPartition(ownerId, input.status)),
        createdAt: now,
        updatedAt: now,
      };
      await repos.tasks.insert(task);
      if (input.tagIds.length > 0) {
        await this.associations.apply(repos, task, { kind: "replace", tagIds: input.tagIds });
      }
      return this.hydrateOne(repos, ownerId, task.id);
    });

    this.events?.publish(ownerId, { type: "task_created", task: view });
    return view;
  }

  async updateTask(ownerId: string, taskId: string, input: TaskUpdateInput): Promise<TaskView> {
    await this.precheckTags(ownerId, input.tagIds);

    const { view, changes, changed } = await this.store.withTransaction(async (repos) => {
      const task = assertOwned(await repos.tasks.findById(taskId), ownerId, "task");

      const patch: TaskPatch = {};
      if (input.title !== undefined) patch.title = input.title;
      if (input.description !== undefined) patch.description = input.description;
      if (input.priority !== undefined) patch.priority = input.priority;
      if (input.dueDate !== undefined) patch.dueDate = input.dueDate;

      const now = this.clock();
      const patched = Object.keys(patch).length > 0;
      if (patched) {
        await repos.tasks.update(task.id, { ...patch, updatedAt: now });
      }

      let tagsChanged = false;
      if (input.tagIds !== undefined) {
        const sync = await this.associations.apply(repos, task, { kind: "replace", tagIds: input.tagIds });
        tagsChanged = sync.changed;
        if (tagsChanged && !patched) {
          await repos.tasks.update(task.id, { updatedAt: now });
        }
      }

      const moved =
        input.status !== undefined && input.status !== task.status
          ? await this.move(repos, task, input.status, END_OF_COLUMN)
          : [];

      return {
        view: await this.hydrateOne(repos, ownerId, task.id),
        changes: moved,
        changed: patched || tagsChanged || moved.length > 0,
      };
    });

    if (changed) {
      this.events?.publish(ownerId, { type: "task_updated", task: view });
    }
    if (changes.length > 1) {
      this.events?.publish(ownerId, { type: "tasks_reorder", tasks: changes });
    }
    return view;
  }

  updateStatus(ownerId: string, taskId: string, status: TaskStatus): Promise<TaskView> {
    return this.updateTask(ownerId, taskId, { status });
  }

  async deleteTask(ownerId: string, taskId: string): Promise<void> {
    await this.store.withTransaction(async (repos) => {
      const task = assertOwned(await repos.tasks.findById(taskId), ownerId, "task");
      await repos.taskTags.deleteByTask(task.id);
      await repos.tasks.delete(task.id);
    });

    this.events?.publish(ownerId, { type: "task_deleted", id: taskId });
  }

  /**
   * Drag-and-drop move. `targetStatus` defaults to the task's column; a
   * position past the end of the column appends.
   */
  async reorder(ownerId: string, input: ReorderInput): Promise<ReorderResult> {
    const result = await this.store.withTransaction(async (repos) => {
      const task = assertOwned(await repos.tasks.findById(input.taskId), ownerId, "task");
      const changes = await this.move(repos, task, input.targetStatus ?? task.status, input.targetPosition);
      return { task: await this.hydrateOne(repos, ownerId, task.id), changes };
    });

    if (result.changes.length > 0) {
      this.events?.publish(ownerId, { type: "tasks_reorder", tasks: result.changes });
    }
    return result;
  }

  async changeTags(ownerId: string, taskId: string, operation: TagOperation): Promise<TaskView> {
    if (operation.kind !== "remove") {
      await this.precheckTags(ownerId, operation.tagIds);
    }

    const { view, changed } = await this.store.withTransaction(async (repos) => {
      const task = assertOwned(await repos.tasks.findById(taskId), ownerId, "task");
      const sync = await this.associations.apply(repos, task, operation);
      if (sync.changed) {
        await repos.tasks.update(task.id, { updatedAt: this.clock() });
      }
      return { view: await this.hydrateOne(repos, ownerId, task.id), changed: sync.changed };
    });

    if (changed) {
      this.events?.publish(ownerId, { type: "task_updated", task: view });
    }
    return view;
  }
}
