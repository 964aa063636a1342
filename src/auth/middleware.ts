import type { NextFunction, Request, RequestHandler, Response } from "express";
import { UnauthorizedError } from "../errors";
import type { TokenService, TokenSubject } from "./tokens";

export const bearerToken = (header: string | undefined): string | null => {
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) return null;
  return token;
};

export const requireAuth =
  (tokens: TokenService): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      return next(new UnauthorizedError());
    }
    try {
      req.user = tokens.verify(token, "access");
      next();
    } catch (err) {
      next(err);
    }
  };

/** The caller set by requireAuth; routes mounted behind it can rely on it. */
export const currentUser = (req: Request): TokenSubject => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
};
