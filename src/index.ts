import dotenv from "dotenv";
import http from "http";
import { createApp } from "./app";
import { PasswordHasher } from "./auth/password";
import { TokenService } from "./auth/tokens";
import { loadConfig } from "./config";
import { RealtimeHub } from "./realtime";
import { AuthService } from "./services/auth-service";
import { BoardEvents } from "./services/board-events";
import { TagService } from "./services/tag-service";
import { TaskService } from "./services/task-service";
import { UserService } from "./services/user-service";
import { MongoStore } from "./store/mongo-store";

dotenv.config();

(async () => {
  const config = loadConfig();
  const store = await MongoStore.connect(config.mongodbUri, config.mongodbDb);

  const events = new BoardEvents();
  const tokens = new TokenService({
    secret: config.jwtSecret,
    issuer: config.jwtIssuer,
    accessTokenTtlMinutes: config.accessTokenTtlMinutes,
    refreshTokenTtlDays: config.refreshTokenTtlDays,
  });
  const tasks = new TaskService(store, { events });
  const users = new UserService(store);

  const app = createApp(
    {
      auth: new AuthService(store, new PasswordHasher(config.passwordHashing), tokens),
      users,
      tasks,
      tags: new TagService(store),
      tokens,
    },
    { corsOrigins: config.corsOrigins, logRequests: process.env.NODE_ENV !== "test" }
  );

  // ================= HTTP + WebSocket server =================
  const server = http.createServer(app);
  const hub = new RealtimeHub({ server, tokens, tasks, events });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close();
    hub
      .close()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("shutdown failed", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  server.listen(config.port, () => {
    console.log(`Backend listening on ${config.port}`);
  });
})().catch((err: unknown) => {
  console.error("startup failed", err);
  process.exit(1);
});
