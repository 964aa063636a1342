import type { TokenSubject } from "./auth/tokens";

declare global {
  namespace Express {
    interface Request {
      user?: TokenSubject;
    }
  }
}
