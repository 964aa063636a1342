import { Router } from "express";
import { currentUser, requireAuth } from "../auth/middleware";
import type { TokenService } from "../auth/tokens";
import { changePasswordSchema, loginSchema, refreshSchema, registerSchema } from "../schemas";
import type { AuthService } from "../services/auth-service";
import type { UserService } from "../services/user-service";
import { asyncRoute } from "./helpers";

export const authRouter = (auth: AuthService, users: UserService, tokens: TokenService): Router => {
  const router = Router();

  router.post(
    "/register",
    asyncRoute(async (req, res) => {
      const user = await auth.register(registerSchema.parse(req.body));
      res.status(201).json(user);
    })
  );

  router.post(
    "/login",
    asyncRoute(async (req, res) => {
      res.json(await auth.login(loginSchema.parse(req.body)));
    })
  );

  router.post(
    "/refresh",
    asyncRoute(async (req, res) => {
      const { refreshToken } = refreshSchema.parse(req.body);
      res.json(await auth.refresh(refreshToken));
    })
  );

  router.put(
    "/password",
    requireAuth(tokens),
    asyncRoute(async (req, res) => {
      await auth.changePassword(currentUser(req).userId, changePasswordSchema.parse(req.body));
      res.json({ message: "Password changed" });
    })
  );

  router.get(
    "/me",
    requireAuth(tokens),
    asyncRoute(async (req, res) => {
      res.json(await users.getProfile(currentUser(req).userId));
    })
  );

  return router;
};
