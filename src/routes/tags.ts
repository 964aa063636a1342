import { Router } from "express";
import { currentUser } from "../auth/middleware";
import { tagCreateSchema, tagListQuerySchema, tagUpdateSchema } from "../schemas";
import type { TagService } from "../services/tag-service";
import { asyncRoute } from "./helpers";

export const tagsRouter = (tags: TagService): Router => {
  const router = Router();

  router.get(
    "/",
    asyncRoute(async (req, res) => {
      res.json(await tags.listTags(currentUser(req).userId, tagListQuerySchema.parse(req.query)));
    })
  );

  router.post(
    "/",
    asyncRoute(async (req, res) => {
      const tag = await tags.createTag(currentUser(req).userId, tagCreateSchema.parse(req.body));
      res.status(201).json(tag);
    })
  );

  router.get(
    "/:id",
    asyncRoute(async (req, res) => {
      res.json(await tags.getTag(currentUser(req).userId, req.params.id));
    })
  );

  router.put(
    "/:id",
    asyncRoute(async (req, res) => {
      res.json(await tags.updateTag(currentUser(req).userId, req.params.id, tagUpdateSchema.parse(req.body)));
    })
  );

  router.delete(
    "/:id",
    asyncRoute(async (req, res) => {
      await tags.deleteTag(currentUser(req).userId, req.params.id);
      res.status(204).end();
    })
  );

  return router;
};
