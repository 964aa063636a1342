import {
  type AnyBulkWriteOperation,
  type ClientSession,
  type Collection,
  type Db,
  type Document,
  type Filter,
  MongoClient,
  MongoNetworkError,
  MongoServerError,
  MongoServerSelectionError,
  type WithId,
} from "mongodb";
import { ConflictError, TransientStoreError, resolveErrorMessage } from "../errors";
import { TASK_PRIORITIES, TASK_STATUSES } from "../types";
import type { PositionChange, SortOrder, Tag, Task, TaskStatus, TaskTag, User } from "../types";
import type {
  DataStore,
  ListOptions,
  Repositories,
  TagPatch,
  TagRepository,
  TagSortField,
  TaskFilters,
  TaskPatch,
  TaskRepository,
  TaskSortField,
  TaskTagRepository,
  UserPatch,
  UserRepository,
} from "./types";

const DUPLICATE_KEY = 11000;
const WRITE_CONFLICT = 112;

export const translateMongoError = (error: unknown): unknown => {
  if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
    return new ConflictError("Duplicate value violates a unique constraint");
  }
  // A concurrent transaction touched the same rows first.
  if (
    error instanceof MongoServerError &&
    (error.code === WRITE_CONFLICT || error.hasErrorLabel("TransientTransactionError"))
  ) {
    return new ConflictError("Concurrent update, retry the request");
  }
  if (error instanceof MongoNetworkError || error instanceof MongoServerSelectionError) {
    return new TransientStoreError(resolveErrorMessage(error, "Store unavailable"), error);
  }
  return error;
};

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const direction = (order: SortOrder): 1 | -1 => (order === "asc" ? 1 : -1);

const toUser = (doc: WithId<User>): User => ({
  id: doc.id,
  email: doc.email,
  passwordHash: doc.passwordHash,
  displayName: doc.displayName,
  avatarUrl: doc.avatarUrl ?? null,
  isActive: doc.isActive,
  lastLoginAt: doc.lastLoginAt ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toTask = (doc: WithId<Task>): Task => ({
  id: doc.id,
  ownerId: doc.ownerId,
  title: doc.title,
  description: doc.description ?? null,
  status: doc.status,
  priority: doc.priority,
  dueDate: doc.dueDate ?? null,
  completedAt: doc.completedAt ?? null,
  position: doc.position,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toTag = (doc: WithId<Tag>): Tag => ({
  id: doc.id,
  ownerId: doc.ownerId,
  name: doc.name,
  color: doc.color,
  description: doc.description ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

class MongoUserRepository implements UserRepository {
  constructor(
    private readonly users: Collection<User>,
    private readonly session?: ClientSession
  ) {}

  async findById(id: string): Promise<User | null> {
    const doc = await this.users.findOne({ id }, { session: this.session });
    return doc ? toUser(doc) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const doc = await this.users.findOne({ email }, { session: this.session });
    return doc ? toUser(doc) : null;
  }

  async insert(user: User): Promise<void> {
    // insertOne stamps _id onto the object it is given
    await this.users.insertOne({ ...user }, { session: this.session });
  }

  async update(id: string, patch: UserPatch): Promise<void> {
    await this.users.updateOne({ id }, { $set: patch }, { session: this.session });
  }

  async delete(id: string): Promise<boolean> {
    const r = await this.users.deleteOne({ id }, { session: this.session });
    return r.deletedCount > 0;
  }
}

// Enum columns sort by declaration order, not alphabetically.
const RANKED_FIELDS: Partial<Record<TaskSortField, readonly string[]>> = {
  status: TASK_STATUSES,
  priority: TASK_PRIORITIES,
};

class MongoTaskRepository implements TaskRepository {
  constructor(
    private readonly tasks: Collection<Task>,
    private readonly session?: ClientSession
  ) {}

  private filterFor(ownerId: string, filters: TaskFilters): Filter<Task> {
    const filter: Filter<Task> = { ownerId };
    if (filters.status) filter.status = filters.status;
    if (filters.priority) filter.priority = filters.priority;
    if (filters.taskIds) filter.id = { $in: filters.taskIds };
    if (filters.search) {
      const pattern = escapeRegex(filters.search);
      filter.$or = [
        { title: { $regex: pattern, $options: "i" } },
        { description: { $regex: pattern, $options: "i" } },
      ];
    }
    return filter;
  }

  async findById(id: string): Promise<Task | null> {
    const doc = await this.tasks.findOne({ id }, { session: this.session });
    return doc ? toTask(doc) : null;
  }

  async list(ownerId: string, filters: TaskFilters, options: ListOptions<TaskSortField>): Promise<Task[]> {
    const ranks = RANKED_FIELDS[options.sortBy];
    const sortKey = ranks ? "sortRank" : options.sortBy;
    const pipeline: Document[] = [{ $match: this.filterFor(ownerId, filters) }];
    if (ranks) {
      pipeline.push({ $addFields: { sortRank: { $indexOfArray: [ranks, `$${options.sortBy}`] } } });
    }
    pipeline.push(
      { $sort: { [sortKey]: direction(options.sortOrder), id: 1 } },
      { $skip: options.skip },
      { $limit: options.limit }
    );
    if (ranks) {
      pipeline.push({ $unset: "sortRank" });
    }

    const docs = await this.tasks.aggregate<WithId<Task>>(pipeline, { session: this.session }).toArray();
    return docs.map(toTask);
  }

  count(ownerId: string, filters: TaskFilters): Promise<number> {
    return this.tasks.countDocuments(this.filterFor(ownerId, filters), { session: this.session });
  }

  async listPartition(ownerId: string, status: TaskStatus): Promise<Task[]> {
    const docs = await this.tasks
      .find({ ownerId, status }, { session: this.session })
      .sort({ position: 1 })
      .toArray();
    return docs.map(toTask);
  }

  async lastInPartition(ownerId: string, status: TaskStatus): Promise<Task | null> {
    const docs = await this.tasks
      .find({ ownerId, status }, { session: this.session })
      .sort({ position: -1 })
      .limit(1)
      .toArray();
    return docs[0] ? toTask(docs[0]) : null;
  }

  async listOverdue(ownerId: string, now: Date, skip: number, limit: number): Promise<Task[]> {
    const docs = await this.tasks
      .find(
        { ownerId, dueDate: { $ne: null, $lt: now }, status: { $nin: ["done", "archived"] } },
        { session: this.session }
      )
      .sort({ dueDate: 1, id: 1 })
      .skip(skip)
      .limit(limit)
      .toArray();
    return docs.map(toTask);
  }

  async insert(task: Task): Promise<void> {
    await this.tasks.insertOne({ ...task }, { session: this.session });
  }

  async update(id: string, patch: TaskPatch): Promise<void> {
    await this.tasks.updateOne({ id }, { $set: patch }, { session: this.session });
  }

  async applyPositions(ownerId: string, changes: PositionChange[], now: Date): Promise<void> {
    if (changes.length === 0) {
      return;
    }

    // Park every moving row on a negative key first so the unique
    // (ownerId, status, position) index never sees two rows on one key.
    const park: AnyBulkWriteOperation<Task>[] = changes.map((change, index) => ({
      updateOne: {
        filter: { id: change.id, ownerId },
        update: { $set: { position: -(index + 1) } },
      },
    }));
    const settle: AnyBulkWriteOperation<Task>[] = changes.map((change) => ({
      updateOne: {
        filter: { id: change.id, ownerId },
        update: [
          {
            $set: {
              status: change.status,
              position: change.position,
              updatedAt: now,
              completedAt: change.status === "done" ? { $ifNull: ["$completedAt", now] } : null,
            },
          },
        ],
      },
    }));

    await this.tasks.bulkWrite(park, { session: this.session, ordered: true });
    await this.tasks.bulkWrite(settle, { session: this.session, ordered: true });
  }

  async delete(id: string): Promise<boolean> {
    const r = await this.tasks.deleteOne({ id }, { session: this.session });
    return r.deletedCount > 0;
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    const r = await this.tasks.deleteMany({ ownerId }, { session: this.session });
    return r.deletedCount;
  }
}

class MongoTagRepository implements TagRepository {
  constructor(
    private readonly tags: Collection<Tag>,
    private readonly session?: ClientSession
  ) {}

  private filterFor(ownerId: string, search: string | undefined): Filter<Tag> {
    const filter: Filter<Tag> = { ownerId };
    if (search) {
      filter.name = { $regex: escapeRegex(search), $options: "i" };
    }
    return filter;
  }

  async findById(id: string): Promise<Tag | null> {
    const doc = await this.tags.findOne({ id }, { session: this.session });
    return doc ? toTag(doc) : null;
  }

  async findManyOwned(ownerId: string, ids: string[]): Promise<Tag[]> {
    if (ids.length === 0) return [];
    const docs = await this.tags.find({ ownerId, id: { $in: ids } }, { session: this.session }).toArray();
    return docs.map(toTag);
  }

  async findByName(ownerId: string, name: string): Promise<Tag | null> {
    const doc = await this.tags.findOne({ ownerId, name }, { session: this.session });
    return doc ? toTag(doc) : null;
  }

  async list(ownerId: string, search: string | undefined, options: ListOptions<TagSortField>): Promise<Tag[]> {
    const docs = await this.tags
      .find(this.filterFor(ownerId, search), { session: this.session })
      .sort({ [options.sortBy]: direction(options.sortOrder), id: 1 })
      .skip(options.skip)
      .limit(options.limit)
      .toArray();
    return docs.map(toTag);
  }

  count(ownerId: string, search: string | undefined): Promise<number> {
    return this.tags.countDocuments(this.filterFor(ownerId, search), { session: this.session });
  }

  async insert(tag: Tag): Promise<void> {
    await this.tags.insertOne({ ...tag }, { session: this.session });
  }

  async update(id: string, patch: TagPatch): Promise<void> {
    await this.tags.updateOne({ id }, { $set: patch }, { session: this.session });
  }

  async delete(id: string): Promise<boolean> {
    const r = await this.tags.deleteOne({ id }, { session: this.session });
    return r.deletedCount > 0;
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    const r = await this.tags.deleteMany({ ownerId }, { session: this.session });
    return r.deletedCount;
  }
}

class MongoTaskTagRepository implements TaskTagRepository {
  constructor(
    private readonly taskTags: Collection<TaskTag>,
    private readonly session?: ClientSession
  ) {}

  async tagIdsFor(taskId: string): Promise<string[]> {
    const docs = await this.taskTags.find({ taskId }, { session: this.session }).toArray();
    return docs.map((d) => d.tagId);
  }

  async tagIdsForTasks(taskIds: string[]): Promise<Map<string, string[]>> {
    const byTask = new Map<string, string[]>();
    if (taskIds.length === 0) return byTask;

    const docs = await this.taskTags.find({ taskId: { $in: taskIds } }, { session: this.session }).toArray();
    for (const d of docs) {
      const ids = byTask.get(d.taskId) ?? [];
      ids.push(d.tagId);
      byTask.set(d.taskId, ids);
    }
    return byTask;
  }

  async taskIdsFor(tagId: string): Promise<string[]> {
    const docs = await this.taskTags.find({ tagId }, { session: this.session }).toArray();
    return docs.map((d) => d.taskId);
  }

  countByTag(tagId: string): Promise<number> {
    return this.taskTags.countDocuments({ tagId }, { session: this.session });
  }

  async add(ownerId: string, taskId: string, tagIds: string[]): Promise<void> {
    if (tagIds.length === 0) return;
    await this.taskTags.insertMany(
      tagIds.map((tagId) => ({ taskId, tagId, ownerId })),
      { session: this.session, ordered: true }
    );
  }

  async remove(taskId: string, tagIds: string[]): Promise<number> {
    if (tagIds.length === 0) return 0;
    const r = await this.taskTags.deleteMany({ taskId, tagId: { $in: tagIds } }, { session: this.session });
    return r.deletedCount;
  }

  async deleteByTask(taskId: string): Promise<number> {
    const r = await this.taskTags.deleteMany({ taskId }, { session: this.session });
    return r.deletedCount;
  }

  async deleteByTag(tagId: string): Promise<number> {
    const r = await this.taskTags.deleteMany({ tagId }, { session: this.session });
    return r.deletedCount;
  }

  async deleteByOwner(ownerId: string): Promise<number> {
    const r = await this.taskTags.deleteMany({ ownerId }, { session: this.session });
    return r.deletedCount;
  }
}

/** MongoDB-backed store. Transactions need the server to run as a replica set. */
export class MongoStore implements DataStore {
  constructor(
    private readonly client: MongoClient,
    private readonly db: Db
  ) {}

  static async connect(uri: string, dbName: string): Promise<MongoStore> {
    const client = new MongoClient(uri);
    try {
      await client.connect();
    } catch (err) {
      throw translateMongoError(err);
    }
    const store = new MongoStore(client, client.db(dbName));
    await store.ensureIndexes();
    return store;
  }

  private repositories(session?: ClientSession): Repositories {
    return {
      users: new MongoUserRepository(this.db.collection<User>("users"), session),
      tasks: new MongoTaskRepository(this.db.collection<Task>("tasks"), session),
      tags: new MongoTagRepository(this.db.collection<Tag>("tags"), session),
      taskTags: new MongoTaskTagRepository(this.db.collection<TaskTag>("task_tags"), session),
    };
  }

  async ensureIndexes(): Promise<void> {
    await this.db.collection<User>("users").createIndex({ id: 1 }, { unique: true });
    await this.db.collection<User>("users").createIndex({ email: 1 }, { unique: true });
    await this.db.collection<Task>("tasks").createIndex({ id: 1 }, { unique: true });
    await this.db
      .collection<Task>("tasks")
      .createIndex({ ownerId: 1, status: 1, position: 1 }, { unique: true });
    await this.db.collection<Task>("tasks").createIndex({ ownerId: 1, dueDate: 1 });
    await this.db.collection<Tag>("tags").createIndex({ id: 1 }, { unique: true });
    await this.db.collection<Tag>("tags").createIndex({ ownerId: 1, name: 1 }, { unique: true });
    await this.db.collection<TaskTag>("task_tags").createIndex({ taskId: 1, tagId: 1 }, { unique: true });
    await this.db.collection<TaskTag>("task_tags").createIndex({ tagId: 1 });
    await this.db.collection<TaskTag>("task_tags").createIndex({ ownerId: 1 });
  }

  async read<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    try {
      return await work(this.repositories());
    } catch (err) {
      throw translateMongoError(err);
    }
  }

  async withTransaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const session = this.client.startSession();
    try {
      session.startTransaction();
      const result = await work(this.repositories(session));
      await session.commitTransaction();
      return result;
    } catch (err) {
      if (session.inTransaction()) {
        try {
          await session.abortTransaction();
        } catch (abortErr) {
          console.error("transaction abort failed", abortErr);
        }
      }
      throw translateMongoError(err);
    } finally {
      await session.endSession();
    }
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
