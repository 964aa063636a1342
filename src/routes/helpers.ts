import type { NextFunction, Request, RequestHandler, Response } from "express";

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

/** Express 4 ignores rejected handlers; forward them to the error middleware. */
export const asyncRoute =
  (handler: AsyncHandler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
