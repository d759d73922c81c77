import { resolve } from "node:path";
import { z } from "zod";

export type FixedWindowRateLimit = Readonly<{ windowMs: number; maxCount: number }>;

export type BoardGuardrails = Readonly<{
  historyLimit: number;
  /** Undefined means attachments of any size are admitted. */
  maxAttachmentBytes?: number;
  messageRate: FixedWindowRateLimit;
  connectRate: FixedWindowRateLimit;
  uploadRate: FixedWindowRateLimit;
}>;

export type TransportConfig = Readonly<{
  sendTimeoutMs: number;
  maxBufferedBytes: number;
  pingIntervalMs: number;
  pongTimeoutMs: number;
}>;

export type RetentionConfig = Readonly<{
  maxAgeSeconds: number;
  intervalMs: number;
}>;

export type ServerConfig = Readonly<{
  host: string;
  port: number;
  passphrase: string;
  dataDir: string;
  uploadDir: string;
  board: BoardGuardrails;
  transport: TransportConfig;
  retention: RetentionConfig;
}>;

export type ServerConfigParseError = Readonly<{
  type: "invalid_config";
  issues: ReadonlyArray<Readonly<{ path: string; message: string }>>;
}>;

const Defaults = {
  host: "0.0.0.0",
  port: 8787,
  passphrase: "1234",
  dataDir: "data",
  uploadDir: "uploads",
  maxFileMb: 30,
  historyLimit: 800,
  retentionHours: 24,
  cleanIntervalHours: 24,
  sendTimeoutMs: 10_000,
  maxBufferedBytes: 8 * 1024 * 1024,
  pingIntervalMs: 30_000,
  pongTimeoutMs: 75_000,
  messageRateWindowMs: 10_000,
  messageRateMaxCount: 20,
  connectRateWindowMs: 10_000,
  connectRateMaxCount: 30,
  uploadRateWindowMs: 60_000,
  uploadRateMaxCount: 120,
} as const;

const BYTES_PER_MB = 1024 * 1024;
const SECONDS_PER_HOUR = 3600;

function envNumberPreprocess(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    return Number(trimmed);
  }
  return value;
}

function envStringPreprocess(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    return trimmed;
  }
  return value;
}

function envInt(options: {
  min: number;
  max: number;
  default: number;
}): z.ZodType<number, z.ZodTypeDef, unknown> {
  return z.preprocess(
    envNumberPreprocess,
    z.number().int().min(options.min).max(options.max).default(options.default),
  );
}

function envPositiveNumber(options: {
  max: number;
  default: number;
}): z.ZodType<number, z.ZodTypeDef, unknown> {
  return z.preprocess(
    envNumberPreprocess,
    z.number().positive().max(options.max).default(options.default),
  );
}

function envString(options: { default: string }): z.ZodType<string, z.ZodTypeDef, unknown> {
  // The default sits inside the preprocess so that blank values fall back to it too.
  return z.preprocess(envStringPreprocess, z.string().min(1).default(options.default));
}

const EnvSchema = z
  .object({
    LAN_HOST: envString({ default: Defaults.host }),
    LAN_PORT: envInt({ min: 1, max: 65_535, default: Defaults.port }),
    LAN_PASSWORD: envString({ default: Defaults.passphrase }),
    LAN_DATA_DIR: envString({ default: Defaults.dataDir }),
    LAN_UPLOAD_DIR: envString({ default: Defaults.uploadDir }),
    LAN_MAX_FILE_MB: envInt({ min: 0, max: 1_000_000, default: Defaults.maxFileMb }),
    LAN_HISTORY_LIMIT: envInt({ min: 1, max: 100_000, default: Defaults.historyLimit }),
    LAN_RETENTION_HOURS: envPositiveNumber({ max: 24 * 365, default: Defaults.retentionHours }),
    // setInterval delays are capped at 2^31 - 1 ms (about 24.8 days).
    LAN_CLEAN_INTERVAL_HOURS: envPositiveNumber({
      max: 24 * 24,
      default: Defaults.cleanIntervalHours,
    }),
    LAN_SEND_TIMEOUT_MS: envInt({ min: 100, max: 600_000, default: Defaults.sendTimeoutMs }),
    LAN_MAX_BUFFERED_BYTES: envInt({
      min: 1024,
      max: 1024 * BYTES_PER_MB,
      default: Defaults.maxBufferedBytes,
    }),
    LAN_PING_INTERVAL_MS: envInt({ min: 1000, max: 600_000, default: Defaults.pingIntervalMs }),
    LAN_PONG_TIMEOUT_MS: envInt({ min: 1000, max: 1_800_000, default: Defaults.pongTimeoutMs }),
    LAN_MESSAGE_RATE_WINDOW_MS: envInt({
      min: 100,
      max: 600_000,
      default: Defaults.messageRateWindowMs,
    }),
    LAN_MESSAGE_RATE_MAX_COUNT: envInt({
      min: 1,
      max: 10_000,
      default: Defaults.messageRateMaxCount,
    }),
    LAN_CONNECT_RATE_WINDOW_MS: envInt({
      min: 100,
      max: 600_000,
      default: Defaults.connectRateWindowMs,
    }),
    LAN_CONNECT_RATE_MAX_COUNT: envInt({
      min: 1,
      max: 10_000,
      default: Defaults.connectRateMaxCount,
    }),
    LAN_UPLOAD_RATE_WINDOW_MS: envInt({
      min: 100,
      max: 3_600_000,
      default: Defaults.uploadRateWindowMs,
    }),
    LAN_UPLOAD_RATE_MAX_COUNT: envInt({
      min: 1,
      max: 100_000,
      default: Defaults.uploadRateMaxCount,
    }),
  })
  .superRefine((data, ctx) => {
    if (data.LAN_PING_INTERVAL_MS > data.LAN_PONG_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LAN_PING_INTERVAL_MS"],
        message: "Must be <= LAN_PONG_TIMEOUT_MS",
      });
    }
  });

export function parseServerConfig(
  env: unknown,
  options?: { cwd?: string },
): { ok: true; config: ServerConfig } | { ok: false; error: ServerConfigParseError } {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    return { ok: false, error: { type: "invalid_config", issues } };
  }

  const data = parsed.data;
  const cwd = options?.cwd ?? process.cwd();
  const maxFileMb = data.LAN_MAX_FILE_MB;

  const config: ServerConfig = {
    host: data.LAN_HOST,
    port: data.LAN_PORT,
    passphrase: data.LAN_PASSWORD,
    dataDir: resolve(cwd, data.LAN_DATA_DIR),
    uploadDir: resolve(cwd, data.LAN_UPLOAD_DIR),
    board: {
      historyLimit: data.LAN_HISTORY_LIMIT,
      ...(maxFileMb > 0 ? { maxAttachmentBytes: maxFileMb * BYTES_PER_MB } : {}),
      messageRate: {
        windowMs: data.LAN_MESSAGE_RATE_WINDOW_MS,
        maxCount: data.LAN_MESSAGE_RATE_MAX_COUNT,
      },
      connectRate: {
        windowMs: data.LAN_CONNECT_RATE_WINDOW_MS,
        maxCount: data.LAN_CONNECT_RATE_MAX_COUNT,
      },
      uploadRate: {
        windowMs: data.LAN_UPLOAD_RATE_WINDOW_MS,
        maxCount: data.LAN_UPLOAD_RATE_MAX_COUNT,
      },
    },
    transport: {
      sendTimeoutMs: data.LAN_SEND_TIMEOUT_MS,
      maxBufferedBytes: data.LAN_MAX_BUFFERED_BYTES,
      pingIntervalMs: data.LAN_PING_INTERVAL_MS,
      pongTimeoutMs: data.LAN_PONG_TIMEOUT_MS,
    },
    retention: {
      maxAgeSeconds: Math.round(data.LAN_RETENTION_HOURS * SECONDS_PER_HOUR),
      intervalMs: Math.round(data.LAN_CLEAN_INTERVAL_HOURS * SECONDS_PER_HOUR * 1000),
    },
  };

  return { ok: true, config };
}

export function readServerConfig(env: unknown, options?: { cwd?: string }): ServerConfig {
  const parsed = parseServerConfig(env, options);
  if (parsed.ok) return parsed.config;

  const message = `invalid_config: ${parsed.error.issues
    .map((i) => `${i.path}:${i.message}`)
    .join(", ")}`;
  throw new Error(message);
}
