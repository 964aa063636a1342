import jwt from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { UnauthorizedError } from "../errors";

export type TokenType = "access" | "refresh";

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
  /** Access token lifetime in seconds. */
  expiresIn: number;
}

export interface TokenOptions {
  secret: string;
  issuer: string;
  accessTokenTtlMinutes: number;
  refreshTokenTtlDays: number;
}

export interface TokenSubject {
  userId: string;
  email: string;
}

export class TokenService {
  constructor(private readonly options: TokenOptions) {}

  private sign(subject: TokenSubject, type: TokenType, expiresIn: number): string {
    return jwt.sign({ email: subject.email, type }, this.options.secret, {
      algorithm: "HS256",
      subject: subject.userId,
      issuer: this.options.issuer,
      expiresIn,
      jwtid: uuidv4(),
    });
  }

  issuePair(subject: TokenSubject): TokenPair {
    const accessSeconds = this.options.accessTokenTtlMinutes * 60;
    const refreshSeconds = this.options.refreshTokenTtlDays * 24 * 60 * 60;

    return {
      accessToken: this.sign(subject, "access", accessSeconds),
      refreshToken: this.sign(subject, "refresh", refreshSeconds),
      tokenType: "bearer",
      expiresIn: accessSeconds,
    };
  }

  verify(token: string, expected: TokenType): TokenSubject {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: ["HS256"],
        issuer: this.options.issuer,
      });
    } catch {
      throw new UnauthorizedError("Invalid or expired token");
    }

    if (
      typeof payload === "string" ||
      payload.type !== expected ||
      typeof payload.sub !== "string" ||
      typeof payload.email !== "string"
    ) {
      throw new UnauthorizedError("Invalid or expired token");
    }

    return { userId: payload.sub, email: payload.email };
  }
}
