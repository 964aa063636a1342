import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { z } from "zod";
import { startTestServer, type TestServer } from "./support/server";

interface CallOptions {
  method?: string;
  token?: string;
  body?: unknown;
  rawBody?: string;
}

const tokenPairSchema = z.object({ accessToken: z.string(), refreshToken: z.string() });
const withIdSchema = z.object({ id: z.string() });

describe("HTTP API", () => {
  let server: TestServer;
  let users = 0;

  const call = async (path: string, options: CallOptions = {}) => {
    const headers: Record<string, string> = {};
    if (options.token) headers.authorization = `Bearer ${options.token}`;
    if (options.body !== undefined || options.rawBody !== undefined) headers["content-type"] = "application/json";

    const res = await fetch(`${server.baseUrl}${path}`, {
      method: options.method ?? "GET",
      headers,
      body: options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body)),
    });
    const text = await res.text();
    const body: unknown = text.length > 0 ? JSON.parse(text) : null;
    return { status: res.status, body };
  };

  /** Registers a fresh user and returns an access token for them. */
  const signUp = async () => {
    users += 1;
    const email = `user${users}@example.com`;
    const password = "correct-horse-1";
    const registered = await call("/api/v1/auth/register", {
      method: "POST",
      body: { email, password, displayName: "Test User" },
    });
    expect(registered.status).toBe(201);

    const login = await call("/api/v1/auth/login", { method: "POST", body: { email, password } });
    expect(login.status).toBe(200);
    return { email, password, ...tokenPairSchema.parse(login.body) };
  };

  const createTask = async (token: string, body: Record<string, unknown>) => {
    const res = await call("/api/v1/tasks", { method: "POST", token, body });
    expect(res.status).toBe(201);
    return withIdSchema.parse(res.body).id;
  };

  beforeAll(async () => {
    server = await startTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  it("answers the health check", async () => {
    expect(await call("/health")).toEqual({ status: 200, body: { status: "ok" } });
  });

  it("registers, logs in and reads the profile", async () => {
    const { email, accessToken } = await signUp();

    const me = await call("/api/v1/auth/me", { token: accessToken });

    expect(me.status).toBe(200);
    expect(me.body).toMatchObject({ email, displayName: "Test User", lastLoginAt: "2026-01-01T00:00:00.000Z" });
  });

  it("refuses a duplicate registration", async () => {
    const { email } = await signUp();

    const res = await call("/api/v1/auth/register", {
      method: "POST",
      body: { email, password: "other-horse-2", displayName: "Again" },
    });

    expect(res).toEqual({ status: 409, body: { error: "Email is already registered", code: "conflict" } });
  });

  it("issues a new pair from a refresh token", async () => {
    const { refreshToken } = await signUp();

    const res = await call("/api/v1/auth/refresh", { method: "POST", body: { refreshToken } });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ tokenType: "bearer", expiresIn: 1800 });
  });

  it("requires a valid bearer token", async () => {
    expect(await call("/api/v1/tasks")).toEqual({
      status: 401,
      body: { error: "Unauthorized", code: "unauthorized" },
    });
    expect(await call("/api/v1/tasks", { token: "not-a-jwt" })).toEqual({
      status: 401,
      body: { error: "Invalid or expired token", code: "unauthorized" },
    });
  });

  it("hides another user's task behind a 404", async () => {
    const ada = await signUp();
    const bob = await signUp();
    const id = await createTask(ada.accessToken, { title: "Private" });

    expect((await call(`/api/v1/tasks/${id}`, { token: ada.accessToken })).body).toMatchObject({ title: "Private" });
    expect(await call(`/api/v1/tasks/${id}`, { token: bob.accessToken })).toEqual({
      status: 404,
      body: { error: "Task not found", code: "not_found" },
    });
    expect((await call(`/api/v1/tasks/${id}`, { method: "DELETE", token: bob.accessToken })).status).toBe(404);
  });

  it("reports field errors as 422", async () => {
    const { accessToken } = await signUp();

    const res = await call("/api/v1/tasks", { method: "POST", token: accessToken, body: { title: "" } });

    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({
      error: "Invalid request",
      code: "validation_error",
      details: { issues: [{ path: "title" }] },
    });
  });

  it("reports malformed JSON as 422", async () => {
    const { accessToken } = await signUp();

    const res = await call("/api/v1/tasks", { method: "POST", token: accessToken, rawBody: "{" });

    expect(res).toEqual({ status: 422, body: { error: "Malformed JSON body", code: "validation_error" } });
  });

  it("reorders a column through PATCH /tasks/reorder", async () => {
    const { accessToken } = await signUp();
    const a = await createTask(accessToken, { title: "A" });
    const b = await createTask(accessToken, { title: "B" });
    const c = await createTask(accessToken, { title: "C" });

    const res = await call("/api/v1/tasks/reorder", {
      method: "PATCH",
      token: accessToken,
      body: { taskId: c, targetPosition: 0 },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      task: { id: c, position: 500 },
      changes: [{ id: c, status: "todo", position: 500 }],
    });
    const column = await call("/api/v1/tasks/status/todo", { token: accessToken });
    expect(z.array(withIdSchema).parse(column.body).map((t) => t.id)).toEqual([c, a, b]);
  });

  it("rejects a negative target position and an unknown status", async () => {
    const { accessToken } = await signUp();
    const id = await createTask(accessToken, { title: "A" });

    const negative = await call("/api/v1/tasks/reorder", {
      method: "PATCH",
      token: accessToken,
      body: { taskId: id, targetPosition: -1 },
    });
    const badStatus = await call("/api/v1/tasks/status/blocked", { token: accessToken });

    expect(negative.status).toBe(422);
    expect(badStatus.status).toBe(422);
  });

  it("adds and removes tags on a task", async () => {
    const { accessToken } = await signUp();
    const tag = await call("/api/v1/tags", { method: "POST", token: accessToken, body: { name: "work" } });
    const tagId = withIdSchema.parse(tag.body).id;
    const taskId = await createTask(accessToken, { title: "A" });

    const added = await call(`/api/v1/tasks/${taskId}/tags`, {
      method: "POST",
      token: accessToken,
      body: { tagIds: [tagId] },
    });
    expect(added.body).toMatchObject({ tags: [{ id: tagId, name: "work", color: "#3B82F6" }] });
    expect((await call(`/api/v1/tags/${tagId}`, { token: accessToken })).body).toMatchObject({ taskCount: 1 });

    const removed = await call(`/api/v1/tasks/${taskId}/tags/${tagId}`, { method: "DELETE", token: accessToken });
    expect(removed.body).toMatchObject({ tags: [] });
  });

  it("clears every tag with an empty replace", async () => {
    const { accessToken } = await signUp();
    const tag = await call("/api/v1/tags", { method: "POST", token: accessToken, body: { name: "home" } });
    const taskId = await createTask(accessToken, { title: "A", tagIds: [withIdSchema.parse(tag.body).id] });

    const cleared = await call(`/api/v1/tasks/${taskId}/tags`, {
      method: "PUT",
      token: accessToken,
      body: { tagIds: [] },
    });

    expect(cleared.status).toBe(200);
    expect(cleared.body).toMatchObject({ id: taskId, tags: [] });
    const adding = await call(`/api/v1/tasks/${taskId}/tags`, { method: "POST", token: accessToken, body: { tagIds: [] } });
    expect(adding.status).toBe(422);
  });

  it("deletes the account and its sessions stop working for login", async () => {
    const { email, password, accessToken } = await signUp();
    await createTask(accessToken, { title: "A" });

    expect((await call("/api/v1/users/me", { method: "DELETE", token: accessToken })).status).toBe(204);

    const login = await call("/api/v1/auth/login", { method: "POST", body: { email, password } });
    expect(login.status).toBe(401);
  });

  it("answers unknown routes with a JSON 404", async () => {
    expect(await call("/api/v1/nowhere")).toEqual({
      status: 404,
      body: { error: "Route not found", code: "not_found" },
    });
  });
});
