import { z } from "zod";

type EnvSource = Record<string, string | undefined>;

const requiredSecret = (key: string) =>
  z
    .string({ required_error: `${key} must be defined` })
    .trim()
    .min(1, `${key} cannot be empty`);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  BRICKLINK_CONSUMER_KEY: requiredSecret("BRICKLINK_CONSUMER_KEY"),
  BRICKLINK_CONSUMER_SECRET: requiredSecret("BRICKLINK_CONSUMER_SECRET"),
  BRICKLINK_ACCESS_TOKEN: requiredSecret("BRICKLINK_ACCESS_TOKEN"),
  BRICKLINK_TOKEN_SECRET: requiredSecret("BRICKLINK_TOKEN_SECRET"),
  BRICKLINK_BASE_URL: z
    .string()
    .url("BRICKLINK_BASE_URL must be a valid URL")
    .default("https://api.bricklink.com/api/store/v1"),
  CATALOG_CACHE_TTL_SECONDS: positiveInt(86_400),
  CATALOG_CACHE_SIZE: positiveInt(100),
  HTTP_TIMEOUT_MS: positiveInt(30_000),
  LEGO_DB_PATH: z.string().trim().min(1).default("./data/lego_inventory.db"),
  PORT: positiveInt(8000),
});

export type AppConfig = {
  bricklink: {
    consumerKey: string;
    consumerSecret: string;
    accessToken: string;
    tokenSecret: string;
    baseUrl: string;
  };
  catalog: {
    cacheTtlMs: number;
    cacheSize: number;
  };
  http: {
    timeoutMs: number;
    port: number;
  };
  dbPath: string;
};

// Blank strings count as unset so optional keys fall back to their defaults.
function withoutBlanks(source: EnvSource): EnvSource {
  return Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
}

export function loadConfig(source: EnvSource = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlanks(source));
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path.join(".");
      return issue.message.includes(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const env = result.data;
  return {
    bricklink: {
      consumerKey: env.BRICKLINK_CONSUMER_KEY,
      consumerSecret: env.BRICKLINK_CONSUMER_SECRET,
      accessToken: env.BRICKLINK_ACCESS_TOKEN,
      tokenSecret: env.BRICKLINK_TOKEN_SECRET,
      baseUrl: env.BRICKLINK_BASE_URL.replace(/\/+$/, ""),
    },
    catalog: {
      cacheTtlMs: env.CATALOG_CACHE_TTL_SECONDS * 1000,
      cacheSize: env.CATALOG_CACHE_SIZE,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
      port: env.PORT,
    },
    dbPath: env.LEGO_DB_PATH,
  };
}
