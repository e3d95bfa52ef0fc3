import os from "node:os";
import { z } from "zod";

function jsonEnv<T extends z.ZodTypeAny>(schema: T, fallback: string) {
  return z
    .string()
    .optional()
    .default(fallback)
    .transform((value, ctx) => {
      try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a JSON value" });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const booleanEnv = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .optional()
    .default(fallback)
    .transform((value) => value === "true");

const rateClassSchema = z.object({
  capacity: z.number().int().positive(),
  refillIntervalMs: z.number().int().positive(),
});

const rateClassesSchema = z
  .record(rateClassSchema)
  .refine((classes) => "default" in classes, { message: "a `default` rate class is required" });

const statusCodesSchema = z.array(z.number().int().min(100).max(599));

const envSchema = z
  .object({
    NODE_ENV: z.string().optional().default("development"),
    PORT: z.coerce.number().optional().default(8080),
    ORCH_API_KEY: z.string().min(1),
    WORKER_ID: z.string().optional(),
    STORE_DRIVER: z.enum(["postgres", "memory"]).optional().default("postgres"),
    PGHOST: z.string().optional(),
    PGPORT: z.coerce.number().default(5432),
    POSTGRES_USER: z.string().optional(),
    POSTGRES_PASSWORD: z.string().optional(),
    POSTGRES_DB: z.string().optional(),
    OLLAMA_BASE_URL: z.string().optional().default("http://localhost:11434"),
    OLLAMA_MODEL: z.string().optional().default("llama3.2"),
    OLLAMA_MAX_TOKENS: z.coerce.number().optional().default(512),
    OLLAMA_TIMEOUT_MS: z.coerce.number().optional().default(60000),
    CITATION_SERVICE_URL: z.string().optional(),
    CITATION_SERVICE_API_KEY: z.string().optional(),
    RENDERER_URL: z.string().optional(),
    RENDERER_API_KEY: z.string().optional(),
    PROXY_POOL: jsonEnv(z.array(z.string().url()), "[]"),
    MINIO_ENDPOINT: z.string().optional(),
    MINIO_ACCESS_KEY: z.string().optional(),
    MINIO_SECRET_KEY: z.string().optional(),
    MINIO_BUCKET: z.string().optional().default("research-fetch"),
    MINIO_USE_SSL: booleanEnv("false"),
    STATUS_WEBHOOK_URL: z.string().optional(),
    STATUS_WEBHOOK_API_KEY: z.string().optional(),
    MAX_WORKERS: z.coerce.number().int().positive().optional().default(8),
    TASK_TIMEOUT_SECONDS: z.coerce.number().positive().optional().default(900),
    ATTEMPT_TIMEOUT_MS: z.coerce.number().positive().optional().default(15000),
    MAX_ATTEMPT_TIMEOUT_MS: z.coerce.number().positive().optional().default(60000),
    TIMEOUT_EXTENSION_FACTOR: z.coerce.number().min(1).optional().default(2),
    MAX_BODY_BYTES: z.coerce.number().int().positive().optional().default(2_000_000),
    JITTER_MIN_MS: z.coerce.number().min(0).optional().default(150),
    JITTER_MAX_MS: z.coerce.number().min(0).optional().default(1200),
    BLOCKED_STATUS_CODES: jsonEnv(statusCodesSchema, "[401,403,407,451]"),
    RATE_LIMITED_STATUS_CODES: jsonEnv(statusCodesSchema, "[429]"),
    MIN_TEXT_LENGTH: z.coerce.number().int().min(0).optional().default(200),
    BACKOFF_BASE_MS: z.coerce.number().positive().optional().default(500),
    BACKOFF_CAP_MS: z.coerce.number().positive().optional().default(30000),
    BACKOFF_JITTER_MS: z.coerce.number().min(0).optional(),
    MAX_RETRIES_PER_STRATEGY: z.coerce.number().int().min(0).optional().default(3),
    CONSECUTIVE_FAILURE_LIMIT: z.coerce.number().int().min(1).optional().default(2),
    USE_STRATEGY_HINTS: booleanEnv("true"),
    CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).optional().default(0.7),
    MAX_INFERENCE_CHARS: z.coerce.number().int().positive().optional().default(6000),
    MAX_CROSS_REFERENCES: z.coerce.number().int().min(0).optional().default(4),
    DELIVERY_MAX_RETRIES: z.coerce.number().int().min(0).optional().default(4),
    DELIVERY_BASE_DELAY_MS: z.coerce.number().positive().optional().default(1000),
    DELIVERY_MAX_DELAY_MS: z.coerce.number().positive().optional().default(30000),
    DELIVERY_LEASE_SECONDS: z.coerce.number().positive().optional().default(300),
    RATE_LIMIT_CLASSES: jsonEnv(rateClassesSchema, '{"default":{"capacity":4,"refillIntervalMs":10000}}'),
    DOMAIN_RATE_CLASSES: jsonEnv(z.record(z.string()), "{}"),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === "postgres") {
      for (const key of ["PGHOST", "POSTGRES_USER", "POSTGRES_PASSWORD", "POSTGRES_DB"] as const) {
        if (!env[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "required when STORE_DRIVER=postgres" });
        }
      }
    }
    for (const [domain, className] of Object.entries(env.DOMAIN_RATE_CLASSES)) {
      if (!(className in env.RATE_LIMIT_CLASSES)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["DOMAIN_RATE_CLASSES", domain],
          message: `unknown rate class ${className}`,
        });
      }
    }
    if (env.JITTER_MAX_MS < env.JITTER_MIN_MS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["JITTER_MAX_MS"], message: "must be >= JITTER_MIN_MS" });
    }
  });

export function loadConfig(source: NodeJS.ProcessEnv) {
  const env = envSchema.parse(source);
  const trim = (value?: string) => value?.replace(/\/$/, "");
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    apiKey: env.ORCH_API_KEY,
    workerId: env.WORKER_ID ?? os.hostname(),
    store: {
      driver: env.STORE_DRIVER,
    },
    database: {
      host: env.PGHOST ?? "",
      port: env.PGPORT,
      user: env.POSTGRES_USER ?? "",
      password: env.POSTGRES_PASSWORD ?? "",
      database: env.POSTGRES_DB ?? "",
    },
    inference: {
      baseUrl: env.OLLAMA_BASE_URL.replace(/\/$/, ""),
      model: env.OLLAMA_MODEL,
      maxTokens: env.OLLAMA_MAX_TOKENS,
      timeoutMs: env.OLLAMA_TIMEOUT_MS,
    },
    citations: {
      serviceUrl: trim(env.CITATION_SERVICE_URL),
      apiKey: env.CITATION_SERVICE_API_KEY,
    },
    renderer: {
      url: trim(env.RENDERER_URL),
      apiKey: env.RENDERER_API_KEY,
    },
    minio: env.MINIO_ENDPOINT
      ? {
          endpoint: env.MINIO_ENDPOINT,
          accessKey: env.MINIO_ACCESS_KEY ?? "",
          secretKey: env.MINIO_SECRET_KEY ?? "",
          bucket: env.MINIO_BUCKET,
          useSSL: env.MINIO_USE_SSL,
        }
      : null,
    statusWebhook: {
      url: env.STATUS_WEBHOOK_URL,
      apiKey: env.STATUS_WEBHOOK_API_KEY,
    },
    scheduler: {
      maxWorkers: env.MAX_WORKERS,
      taskTimeoutMs: env.TASK_TIMEOUT_SECONDS * 1000,
      attemptTimeoutMs: env.ATTEMPT_TIMEOUT_MS,
      useStrategyHints: env.USE_STRATEGY_HINTS,
    },
    fetch: {
      maxBodyBytes: env.MAX_BODY_BYTES,
      proxies: env.PROXY_POOL,
      jitter: { minMs: env.JITTER_MIN_MS, maxMs: env.JITTER_MAX_MS },
    },
    classifier: {
      blockedStatusCodes: env.BLOCKED_STATUS_CODES,
      rateLimitedStatusCodes: env.RATE_LIMITED_STATUS_CODES,
      minTextLength: env.MIN_TEXT_LENGTH,
    },
    escalation: {
      backoffBaseMs: env.BACKOFF_BASE_MS,
      backoffCapMs: env.BACKOFF_CAP_MS,
      jitterMaxMs: env.BACKOFF_JITTER_MS ?? env.BACKOFF_BASE_MS,
      maxRetriesPerStrategy: env.MAX_RETRIES_PER_STRATEGY,
      consecutiveFailureLimit: env.CONSECUTIVE_FAILURE_LIMIT,
      timeoutExtensionFactor: env.TIMEOUT_EXTENSION_FACTOR,
      maxAttemptTimeoutMs: env.MAX_ATTEMPT_TIMEOUT_MS,
    },
    rateLimit: {
      classes: env.RATE_LIMIT_CLASSES,
      domainClasses: env.DOMAIN_RATE_CLASSES,
    },
    validation: {
      confidenceThreshold: env.CONFIDENCE_THRESHOLD,
      maxInferenceChars: env.MAX_INFERENCE_CHARS,
      maxCrossReferences: env.MAX_CROSS_REFERENCES,
    },
    delivery: {
      maxRetries: env.DELIVERY_MAX_RETRIES,
      baseDelayMs: env.DELIVERY_BASE_DELAY_MS,
      maxDelayMs: env.DELIVERY_MAX_DELAY_MS,
      leaseMs: env.DELIVERY_LEASE_SECONDS * 1000,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig(process.env);
