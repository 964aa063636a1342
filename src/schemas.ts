import { z } from "zod";
import { TAG_SORT_FIELDS, TASK_SORT_FIELDS } from "./store/types";
import { TASK_PRIORITIES, TASK_STATUSES } from "./types";

export const TITLE_MAX_LENGTH = 100;
export const DESCRIPTION_MAX_LENGTH = 2000;
export const TAG_NAME_MAX_LENGTH = 30;
export const TAG_DESCRIPTION_MAX_LENGTH = 200;
export const DEFAULT_TAG_COLOR = "#3B82F6";
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const WEAK_PASSWORDS = new Set([
  "password",
  "12345678",
  "qwerty",
  "admin",
  "123456789",
  "password123",
  "admin123",
]);

export const taskStatusSchema = z.enum(TASK_STATUSES);
export const taskPrioritySchema = z.enum(TASK_PRIORITIES);

/** Blank text clears the field. */
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .transform((value) => (value.length > 0 ? value : null))
    .nullable()
    .optional();

const dateTime = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const idList = z.array(z.string().trim().min(1));

export const passwordSchema = z
  .string()
  .min(8)
  .max(128)
  .regex(/[A-Za-z]/, "Password must contain a letter")
  .regex(/[0-9]/, "Password must contain a digit")
  .refine((value) => !WEAK_PASSWORDS.has(value.toLowerCase()), "Password is too common");

export const registerSchema = z.object({
  email: z.string().trim().toLowerCase().email().max(255),
  password: passwordSchema,
  displayName: z.string().trim().min(2).max(50),
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(1),
});

export const refreshSchema = z.object({
  refreshToken: z.string().min(1),
});

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: passwordSchema,
});

export const profileUpdateSchema = z.object({
  displayName: z.string().trim().min(2).max(50).optional(),
  avatarUrl: z.string().trim().url().max(500).nullable().optional(),
});

export const taskCreateSchema = z.object({
  title: z.string().trim().min(1).max(TITLE_MAX_LENGTH),
  description: optionalText(DESCRIPTION_MAX_LENGTH),
  status: taskStatusSchema.default("todo"),
  priority: taskPrioritySchema.default("medium"),
  dueDate: dateTime.nullable().optional(),
  tagIds: idList.default([]),
});

export const taskUpdateSchema = z.object({
  title: z.string().trim().min(1).max(TITLE_MAX_LENGTH).optional(),
  description: optionalText(DESCRIPTION_MAX_LENGTH),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  dueDate: dateTime.nullable().optional(),
  tagIds: idList.optional(),
});

export const taskStatusUpdateSchema = z.object({
  status: taskStatusSchema,
});

export const reorderSchema = z.object({
  taskId: z.string().trim().min(1),
  targetStatus: taskStatusSchema.optional(),
  targetPosition: z.number().int().min(0),
});

export const tagIdsSchema = z.object({
  tagIds: idList.min(1),
});

/** An empty list clears every tag. */
export const tagReplaceSchema = z.object({
  tagIds: idList,
});

const sortOrderSchema = z.enum(["asc", "desc"]);

const pagination = {
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
};

export const taskListQuerySchema = z.object({
  ...pagination,
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  tagId: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).max(100).optional(),
  sortBy: z.enum(TASK_SORT_FIELDS).default("createdAt"),
  sortOrder: sortOrderSchema.default("desc"),
});

export const pageQuerySchema = z.object(pagination);

const colorSchema = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "Color must look like #RRGGBB");

export const tagCreateSchema = z.object({
  name: z.string().trim().min(1).max(TAG_NAME_MAX_LENGTH),
  color: colorSchema.default(DEFAULT_TAG_COLOR),
  description: optionalText(TAG_DESCRIPTION_MAX_LENGTH),
});

export const tagUpdateSchema = z.object({
  name: z.string().trim().min(1).max(TAG_NAME_MAX_LENGTH).optional(),
  color: colorSchema.optional(),
  description: optionalText(TAG_DESCRIPTION_MAX_LENGTH),
});

export const tagListQuerySchema = z.object({
  ...pagination,
  search: z.string().trim().min(1).max(100).optional(),
  sortBy: z.enum(TAG_SORT_FIELDS).default("createdAt"),
  sortOrder: sortOrderSchema.default("desc"),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
export type ProfileUpdateInput = z.infer<typeof profileUpdateSchema>;
export type TaskCreateInput = z.infer<typeof taskCreateSchema>;
export type TaskUpdateInput = z.infer<typeof taskUpdateSchema>;
export type ReorderInput = z.infer<typeof reorderSchema>;
export type TaskListQuery = z.infer<typeof taskListQuerySchema>;
export type PageQuery = z.infer<typeof pageQuerySchema>;
export type TagCreateInput = z.infer<typeof tagCreateSchema>;
export type TagUpdateInput = z.infer<typeof tagUpdateSchema>;
export type TagListQuery = z.infer<typeof tagListQuerySchema>;
