export const TASK_STATUSES = ["todo", "in_progress", "done", "archived"] as const;
export const TASK_PRIORITIES = ["low", "medium", "high", "urgent"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export type User = {
  id: string;
  email: string;
  passwordHash: string; // argon2id
  displayName: string;
  avatarUrl: string | null;
  isActive: boolean;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type Task = {
  id: string;
  ownerId: string;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  dueDate: Date | null;
  completedAt: Date | null;
  position: number; // ordering key, unique within (ownerId, status)
  createdAt: Date;
  updatedAt: Date;
};

export type Tag = {
  id: string;
  ownerId: string;
  name: string; // unique per owner
  color: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type TaskTag = {
  taskId: string;
  tagId: string;
  ownerId: string;
};

export type TagSummary = Pick<Tag, "id" | "name" | "color">;

export type TaskView = {
  id: string;
  ownerId: string;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  dueDate: string | null;
  completedAt: string | null;
  position: number;
  createdAt: string;
  updatedAt: string;
  tags: TagSummary[];
};

export type TagView = {
  id: string;
  name: string;
  color: string;
  description: string | null;
  createdAt: string;
  updatedAt: string;
  taskCount?: number;
};

export type UserView = {
  id: string;
  email: string;
  displayName: string;
  avatarUrl: string | null;
  isActive: boolean;
  lastLoginAt: string | null;
  createdAt: string;
  updatedAt: string;
};

export type PositionChange = {
  id: string;
  status: TaskStatus;
  position: number;
};

export type SortOrder = "asc" | "desc";
