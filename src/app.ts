import cors from "cors";
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from "express";
import { ZodError } from "zod";
import { requireAuth } from "./auth/middleware";
import type { TokenService } from "./auth/tokens";
import { AppError } from "./errors";
import { authRouter } from "./routes/auth";
import { tagsRouter } from "./routes/tags";
import { tasksRouter } from "./routes/tasks";
import { usersRouter } from "./routes/users";
import type { AuthService } from "./services/auth-service";
import type { TagService } from "./services/tag-service";
import type { TaskService } from "./services/task-service";
import type { UserService } from "./services/user-service";

export interface AppServices {
  auth: AuthService;
  users: UserService;
  tasks: TaskService;
  tags: TagService;
  tokens: TokenService;
}

export interface AppOptions {
  /** Allowed CORS origins; empty allows any. */
  corsOrigins?: string[];
  logRequests?: boolean;
}

const requestLogger: RequestHandler = (req, res, next) => {
  const started = Date.now();
  res.on("finish", () => {
    console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
  });
  next();
};

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(422).json({
      error: "Invalid request",
      code: "validation_error",
      details: {
        issues: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      },
    });
  }

  // body-parser tags malformed JSON with this type
  if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
    return res.status(422).json({ error: "Malformed JSON body", code: "validation_error" });
  }

  if (err instanceof AppError) {
    return res.status(err.status).json({
      error: err.message,
      code: err.code,
      ...(err.details && { details: err.details }),
    });
  }

  console.error("unhandled error", err);
  res.status(500).json({ error: "Internal server error", code: "internal_error" });
};

export function createApp(services: AppServices, options: AppOptions = {}): Express {
  const app = express();
  const origins = options.corsOrigins ?? [];

  app.use(cors(origins.length > 0 ? { origin: origins } : undefined));
  app.use(express.json());
  if (options.logRequests) {
    app.use(requestLogger);
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const api = express.Router();
  api.use("/auth", authRouter(services.auth, services.users, services.tokens));
  api.use("/users", requireAuth(services.tokens), usersRouter(services.users));
  api.use("/tasks", requireAuth(services.tokens), tasksRouter(services.tasks));
  api.use("/tags", requireAuth(services.tokens), tagsRouter(services.tags));
  app.use("/api/v1", api);

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found", code: "not_found" });
  });
  app.use(errorHandler);

  return app;
}
