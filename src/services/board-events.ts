import type { PositionChange, TaskView } from "../types";

export type BoardEvent =
  | { type: "task_created"; task: TaskView }
  | { type: "task_updated"; task: TaskView }
  | { type: "task_deleted"; id: string }
  | { type: "tasks_reorder"; tasks: PositionChange[] };

export type BoardEventCallback = (ownerId: string, event: BoardEvent) => void;

export class BoardEvents {
  private listeners: Set<BoardEventCallback> = new Set();

  publish(ownerId: string, event: BoardEvent): void {
    for (const listener of this.listeners) {
      listener(ownerId, event);
    }
  }

  subscribe(callback: BoardEventCallback): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }
}
