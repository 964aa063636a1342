export interface PasswordHashingConfig {
  timeCost: number;
  memoryCost: number;
  parallelism: number;
}

export interface AppConfig {
  port: number;
  mongodbUri: string;
  mongodbDb: string;
  jwtSecret: string;
  jwtIssuer: string;
  accessTokenTtlMinutes: number;
  refreshTokenTtlDays: number;
  corsOrigins: string[];
  passwordHashing: PasswordHashingConfig;
}

type EnvMap = Record<string, string | undefined>;

export const MIN_JWT_SECRET_LENGTH = 32;

const DEFAULT_PORT = 4000;
const DEFAULT_DB = "kanban";
const DEFAULT_ISSUER = "kanban-task-api";
const DEFAULT_ACCESS_TOKEN_MINUTES = 30;
const DEFAULT_REFRESH_TOKEN_DAYS = 30;

const parseIntInRange = (raw: string | undefined, fallback: number, min: number, max: number): number => {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    return fallback;
  }
  return parsed;
};

const parseList = (raw: string | undefined): string[] => {
  if (!raw) {
    return [];
  }

  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

export const createConfig = (env: EnvMap = process.env): AppConfig => ({
  port: parseIntInRange(env.PORT, DEFAULT_PORT, 0, 65535),
  mongodbUri: (env.MONGODB_URI || "").trim(),
  mongodbDb: (env.MONGODB_DB || "").trim() || DEFAULT_DB,
  jwtSecret: env.JWT_SECRET ?? "",
  jwtIssuer: (env.JWT_ISSUER || "").trim() || DEFAULT_ISSUER,
  accessTokenTtlMinutes: parseIntInRange(env.ACCESS_TOKEN_EXPIRE_MINUTES, DEFAULT_ACCESS_TOKEN_MINUTES, 1, 24 * 60),
  refreshTokenTtlDays: parseIntInRange(env.REFRESH_TOKEN_EXPIRE_DAYS, DEFAULT_REFRESH_TOKEN_DAYS, 1, 365),
  corsOrigins: parseList(env.CORS_ORIGINS),
  passwordHashing: {
    timeCost: parseIntInRange(env.ARGON2_TIME_COST, 3, 1, 10),
    memoryCost: parseIntInRange(env.ARGON2_MEMORY_COST, 65536, 1024, 1048576),
    parallelism: parseIntInRange(env.ARGON2_PARALLELISM, 4, 1, 16),
  },
});

/** Like createConfig, but refuses to start without a database or a usable secret. */
export const loadConfig = (env: EnvMap = process.env): AppConfig => {
  const config = createConfig(env);

  if (!config.mongodbUri) {
    throw new Error("MONGODB_URI not set");
  }
  if (config.jwtSecret.length < MIN_JWT_SECRET_LENGTH) {
    throw new Error(`JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters`);
  }

  return config;
};
