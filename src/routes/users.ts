import { Router } from "express";
import { currentUser } from "../auth/middleware";
import { profileUpdateSchema } from "../schemas";
import type { UserService } from "../services/user-service";
import { asyncRoute } from "./helpers";

export const usersRouter = (users: UserService): Router => {
  const router = Router();

  router.get(
    "/me",
    asyncRoute(async (req, res) => {
      res.json(await users.getProfile(currentUser(req).userId));
    })
  );

  router.put(
    "/me",
    asyncRoute(async (req, res) => {
      res.json(await users.updateProfile(currentUser(req).userId, profileUpdateSchema.parse(req.body)));
    })
  );

  router.delete(
    "/me",
    asyncRoute(async (req, res) => {
      await users.deleteAccount(currentUser(req).userId);
      res.status(204).end();
    })
  );

  return router;
};
