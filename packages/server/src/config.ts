import { parseArgs } from "node:util";
import { z } from "zod";
import { LOG_LEVELS } from "./logger";

// Server configuration with explicit defaults.
export const DEFAULT_PORT = 56321;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_FILE_TTL_SECONDS = 60 * 60;
export const DEFAULT_MAX_FILE_SIZE_BYTES = 100 * 1024 * 1024;
export const DEFAULT_MAX_STORAGE_BYTES = 512 * 1024 * 1024;
export const DEFAULT_MAX_TEXT_SIZE_BYTES = 2 * 1024 * 1024;
export const DEFAULT_SWEEP_INTERVAL_SECONDS = 60;
export const DEFAULT_HEARTBEAT_INTERVAL_SECONDS = 30;
export const DEFAULT_CLIENT_TIMEOUT_SECONDS = 90;
export const DEFAULT_SEND_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_QUEUED_EVENTS = 256;
export const DEFAULT_MAX_FRAME_BYTES = 32 * 1024 * 1024;

const positiveInt = () => z.coerce.number().int().positive();

const ServerConfigFieldsSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  fileTtlSeconds: positiveInt().default(DEFAULT_FILE_TTL_SECONDS),
  maxFileSizeBytes: positiveInt().default(DEFAULT_MAX_FILE_SIZE_BYTES),
  maxStorageBytes: positiveInt().default(DEFAULT_MAX_STORAGE_BYTES),
  maxTextSizeBytes: positiveInt().default(DEFAULT_MAX_TEXT_SIZE_BYTES),
  sweepIntervalSeconds: positiveInt().default(DEFAULT_SWEEP_INTERVAL_SECONDS),
  heartbeatIntervalSeconds: positiveInt().default(DEFAULT_HEARTBEAT_INTERVAL_SECONDS),
  clientTimeoutSeconds: positiveInt().default(DEFAULT_CLIENT_TIMEOUT_SECONDS),
  sendTimeoutMs: positiveInt().default(DEFAULT_SEND_TIMEOUT_MS),
  maxQueuedEvents: positiveInt().default(DEFAULT_MAX_QUEUED_EVENTS),
  // Hard cap on one WebSocket frame; bigger frames close the socket.
  maxFrameBytes: positiveInt().default(DEFAULT_MAX_FRAME_BYTES),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export const ServerConfigSchema = ServerConfigFieldsSchema.refine(
  (config) => config.heartbeatIntervalSeconds < config.clientTimeoutSeconds,
  {
    message: "must be shorter than clientTimeoutSeconds",
    path: ["heartbeatIntervalSeconds"],
  },
);

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const ENV_KEYS: Record<keyof ServerConfig, string> = {
  port: "PORT",
  host: "HOST",
  fileTtlSeconds: "FILE_TTL_SECONDS",
  maxFileSizeBytes: "MAX_FILE_SIZE_BYTES",
  maxStorageBytes: "MAX_STORAGE_BYTES",
  maxTextSizeBytes: "MAX_TEXT_SIZE_BYTES",
  sweepIntervalSeconds: "SWEEP_INTERVAL_SECONDS",
  heartbeatIntervalSeconds: "HEARTBEAT_INTERVAL_SECONDS",
  clientTimeoutSeconds: "CLIENT_TIMEOUT_SECONDS",
  sendTimeoutMs: "SEND_TIMEOUT_MS",
  maxQueuedEvents: "MAX_QUEUED_EVENTS",
  maxFrameBytes: "MAX_FRAME_BYTES",
  logLevel: "LOG_LEVEL",
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// Resolves configuration from environment variables, then command-line flags (flags win).
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = [],
): ServerConfig {
  const raw: Record<string, string> = {};

  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  let flags: { port?: string; host?: string };
  try {
    flags = parseArgs({
      args: argv,
      options: {
        port: { type: "string", short: "p" },
        host: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  if (flags.port !== undefined) raw.port = flags.port;
  if (flags.host !== undefined) raw.host = flags.host;

  const parsed = ServerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}
