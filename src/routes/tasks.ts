import { Router } from "express";
import { currentUser } from "../auth/middleware";
import {
  pageQuerySchema,
  reorderSchema,
  tagIdsSchema,
  tagReplaceSchema,
  taskCreateSchema,
  taskListQuerySchema,
  taskStatusSchema,
  taskStatusUpdateSchema,
  taskUpdateSchema,
} from "../schemas";
import type { TaskService } from "../services/task-service";
import { asyncRoute } from "./helpers";

export const tasksRouter = (tasks: TaskService): Router => {
  const router = Router();

  router.get(
    "/",
    asyncRoute(async (req, res) => {
      res.json(await tasks.listTasks(currentUser(req).userId, taskListQuerySchema.parse(req.query)));
    })
  );

  router.post(
    "/",
    asyncRoute(async (req, res) => {
      const task = await tasks.createTask(currentUser(req).userId, taskCreateSchema.parse(req.body));
      res.status(201).json(task);
    })
  );

  // Fixed paths go before /:id so they are not read as task ids.
  router.patch(
    "/reorder",
    asyncRoute(async (req, res) => {
      res.json(await tasks.reorder(currentUser(req).userId, reorderSchema.parse(req.body)));
    })
  );

  router.get(
    "/status/:status",
    asyncRoute(async (req, res) => {
      const status = taskStatusSchema.parse(req.params.status);
      res.json(await tasks.listColumn(currentUser(req).userId, status));
    })
  );

  router.get(
    "/overdue/list",
    asyncRoute(async (req, res) => {
      res.json(await tasks.listOverdue(currentUser(req).userId, pageQuerySchema.parse(req.query)));
    })
  );

  router.get(
    "/:id",
    asyncRoute(async (req, res) => {
      res.json(await tasks.getTask(currentUser(req).userId, req.params.id));
    })
  );

  router.put(
    "/:id",
    asyncRoute(async (req, res) => {
      res.json(await tasks.updateTask(currentUser(req).userId, req.params.id, taskUpdateSchema.parse(req.body)));
    })
  );

  router.patch(
    "/:id/status",
    asyncRoute(async (req, res) => {
      const { status } = taskStatusUpdateSchema.parse(req.body);
      res.json(await tasks.updateStatus(currentUser(req).userId, req.params.id, status));
    })
  );

  router.delete(
    "/:id",
    asyncRoute(async (req, res) => {
      await tasks.deleteTask(currentUser(req).userId, req.params.id);
      res.status(204).end();
    })
  );

  router.post(
    "/:id/tags",
    asyncRoute(async (req, res) => {
      const { tagIds } = tagIdsSchema.parse(req.body);
      res.json(await tasks.changeTags(currentUser(req).userId, req.params.id, { kind: "add", tagIds }));
    })
  );

  router.put(
    "/:id/tags",
    asyncRoute(async (req, res) => {
      const { tagIds } = tagReplaceSchema.parse(req.body);
      res.json(await tasks.changeTags(currentUser(req).userId, req.params.id, { kind: "replace", tagIds }));
    })
  );

  router.delete(
    "/:id/tags/:tagId",
    asyncRoute(async (req, res) => {
      const { id, tagId } = req.params;
      res.json(await tasks.changeTags(currentUser(req).userId, id, { kind: "remove", tagId }));
    })
  );

  return router;
};
