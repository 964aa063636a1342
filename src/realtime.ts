import type { IncomingMessage, Server } from "http";
import { type RawData, WebSocket, WebSocketServer } from "ws";
import { z } from "zod";
import type { TokenService } from "./auth/tokens";
import { resolveErrorMessage } from "./errors";
import { reorderSchema } from "./schemas";
import type { BoardEvent, BoardEvents } from "./services/board-events";
import type { TaskService } from "./services/task-service";

const clientMessageSchema = z.discriminatedUnion("type", [
  reorderSchema.extend({ type: z.literal("reorder") }),
  z.object({ type: z.literal("sync") }),
]);

export interface RealtimeHubOptions {
  server: Server;
  tokens: TokenService;
  tasks: TaskService;
  events: BoardEvents;
}

const POLICY_VIOLATION = 1008;

/**
 * Pushes board changes to the owner's open sockets. Clients authenticate with
 * `?token=<access token>` and may send `reorder` and `sync` messages.
 */
export class RealtimeHub {
  private readonly wss: WebSocketServer;
  private readonly sockets = new Map<string, Set<WebSocket>>();
  private readonly unsubscribe: () => void;

  constructor(private readonly options: RealtimeHubOptions) {
    this.wss = new WebSocketServer({ server: options.server });
    this.wss.on("connection", (ws, req) => this.handleConnection(ws, req));
    this.unsubscribe = options.events.subscribe((ownerId, event) => this.broadcast(ownerId, event));
  }

  private authenticate(req: IncomingMessage): string | null {
    const url = new URL(req.url ?? "/", "http://localhost");
    const token = url.searchParams.get("token");
    if (!token) return null;
    try {
      return this.options.tokens.verify(token, "access").userId;
    } catch {
      return null;
    }
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    // Protocol errors land here; ws closes the socket itself.
    ws.on("error", (err) => {
      console.error("ws socket error", err);
    });

    const ownerId = this.authenticate(req);
    if (!ownerId) {
      ws.close(POLICY_VIOLATION, "Unauthorized");
      return;
    }

    const sockets = this.sockets.get(ownerId) ?? new Set<WebSocket>();
    sockets.add(ws);
    this.sockets.set(ownerId, sockets);

    ws.on("close", () => {
      sockets.delete(ws);
      if (sockets.size === 0) {
        this.sockets.delete(ownerId);
      }
    });

    ws.on("message", (data) => {
      this.handleMessage(ws, ownerId, data).catch((err: unknown) => {
        console.error("ws message error", err);
        this.send(ws, { type: "error", message: resolveErrorMessage(err, "Message failed") });
      });
    });

    this.sendBoard(ws, ownerId).catch((err: unknown) => {
      console.error("ws init error", err);
    });
  }

  private async handleMessage(ws: WebSocket, ownerId: string, data: RawData): Promise<void> {
    const msg = clientMessageSchema.parse(JSON.parse(data.toString()));
    if (msg.type === "sync") {
      await this.sendBoard(ws, ownerId);
      return;
    }
    // The reorder result reaches this socket through the tasks_reorder broadcast.
    await this.options.tasks.reorder(ownerId, {
      taskId: msg.taskId,
      targetStatus: msg.targetStatus,
      targetPosition: msg.targetPosition,
    });
  }

  private async sendBoard(ws: WebSocket, ownerId: string): Promise<void> {
    const tasks = await this.options.tasks.listBoard(ownerId);
    this.send(ws, { type: "init", tasks });
  }

  private send(ws: WebSocket, payload: unknown): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(payload));
    }
  }

  broadcast(ownerId: string, event: BoardEvent): void {
    for (const ws of this.sockets.get(ownerId) ?? []) {
      this.send(ws, event);
    }
  }

  close(): Promise<void> {
    this.unsubscribe();
    for (const ws of this.wss.clients) {
      ws.terminate();
    }
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
