import type { Tag, TagSummary, TagView, Task, TaskView, User, UserView } from "../types";

const iso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export const toTaskView = (task: Task, tags: TagSummary[]): TaskView => ({
  id: task.id,
  ownerId: task.ownerId,
  title: task.title,
  description: task.description,
  status: task.status,
  priority: task.priority,
  dueDate: iso(task.dueDate),
  completedAt: iso(task.completedAt),
  position: task.position,
  createdAt: task.createdAt.toISOString(),
  updatedAt: task.updatedAt.toISOString(),
  tags,
});

export const toTagSummary = (tag: Tag): TagSummary => ({ id: tag.id, name: tag.name, color: tag.color });

export const toTagView = (tag: Tag, taskCount?: number): TagView => ({
  id: tag.id,
  name: tag.name,
  color: tag.color,
  description: tag.description,
  createdAt: tag.createdAt.toISOString(),
  updatedAt: tag.updatedAt.toISOString(),
  ...(taskCount !== undefined && { taskCount }),
});

export const toUserView = (user: User): UserView => ({
  id: user.id,
  email: user.email,
  displayName: user.displayName,
  avatarUrl: user.avatarUrl,
  isActive: user.isActive,
  lastLoginAt: iso(user.lastLoginAt),
  createdAt: user.createdAt.toISOString(),
  updatedAt: user.updatedAt.toISOString(),
});
