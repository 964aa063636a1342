import { TokenService } from "../../src/auth/tokens";
import { taskCreateSchema, tagCreateSchema } from "../../src/schemas";
import { BoardEvents } from "../../src/services/board-events";
import { TagService } from "../../src/services/tag-service";
import { TaskService } from "../../src/services/task-service";
import { MemoryStore } from "./memory-store";

/** Cheap argon2 settings so hashing stays fast under test. */
export const TEST_HASHING = { timeCost: 2, memoryCost: 4096, parallelism: 1 };

export const TEST_SECRET = "test-secret-test-secret-test-secret";

export const createTokens = () =>
  new TokenService({
    secret: TEST_SECRET,
    issuer: "kanban-task-api",
    accessTokenTtlMinutes: 30,
    refreshTokenTtlDays: 30,
  });

export class TestClock {
  private current: number;

  constructor(start = "2026-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms = 1000): void {
    this.current += ms;
  }
}

export const createBoard = () => {
  const store = new MemoryStore();
  const clock = new TestClock();
  const events = new BoardEvents();
  const tasks = new TaskService(store, { events, clock: () => clock.now() });
  const tags = new TagService(store, () => clock.now());

  const addTask = (ownerId: string, input: Record<string, unknown>) =>
    tasks.createTask(ownerId, taskCreateSchema.parse(input));
  const addTag = (ownerId: string, input: Record<string, unknown>) =>
    tags.createTag(ownerId, tagCreateSchema.parse(input));

  return { store, clock, events, tasks, tags, addTask, addTag };
};
