import { config as loadDotenv } from "dotenv";

export interface SessionConfiguration {
  readonly websocketUrl: string;
  readonly apiBase: string;
  readonly platform: string;
  readonly playerName: string;
  readonly profile: string;
  /** Overrides the per-profile credential directory when set. */
  readonly configDirectory: string | null;
  /** In-memory token; takes precedence over the stored one and is never persisted. */
  readonly sessionToken: string | null;
  readonly retryBackoffMs: number;
  readonly tickRate: number;
}

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_SESSION_CONFIGURATION: SessionConfiguration = {
  websocketUrl: "ws://127.0.0.1:8080/ws",
  apiBase: "http://127.0.0.1:8080",
  platform: "desktop",
  playerName: "Player",
  profile: "default",
  configDirectory: null,
  sessionToken: null,
  retryBackoffMs: 2000,
  tickRate: 60,
};

const readEnvString = (env: EnvironmentSource, key: string): string | null => {
  const value = env[key]?.trim();
  return value ? value : null;
};

const readEnvPositiveNumber = (env: EnvironmentSource, key: string, fallback: number): number => {
  const raw = readEnvString(env, key);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
};

/** Lower-cases and strips a profile name down to a safe directory name. */
export const sanitizeProfileName = (value: string): string => {
  const cleaned = value
    .trim()
    .toLowerCase()
    .replace(/ /g, "_")
    .replace(/[^a-z0-9._-]/g, "");
  return cleaned.length > 0 ? cleaned : "default";
};

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, "");

export const loadSessionConfiguration = (env: EnvironmentSource): SessionConfiguration => {
  const defaults = DEFAULT_SESSION_CONFIGURATION;
  const profile = readEnvString(env, "RUMBLE_PROFILE");
  return {
    websocketUrl: readEnvString(env, "RUMBLE_WS_URL") ?? defaults.websocketUrl,
    apiBase: trimTrailingSlash(readEnvString(env, "RUMBLE_API_BASE") ?? defaults.apiBase),
    platform: readEnvString(env, "RUMBLE_PLATFORM") ?? defaults.platform,
    playerName: readEnvString(env, "RUMBLE_PLAYER_NAME") ?? defaults.playerName,
    profile: profile === null ? defaults.profile : sanitizeProfileName(profile),
    configDirectory: readEnvString(env, "RUMBLE_CONFIG_DIR"),
    sessionToken: readEnvString(env, "RUMBLE_SESSION_TOKEN"),
    retryBackoffMs: readEnvPositiveNumber(env, "RUMBLE_RETRY_BACKOFF_MS", defaults.retryBackoffMs),
    tickRate: readEnvPositiveNumber(env, "RUMBLE_TICK_RATE", defaults.tickRate),
  };
};

/** Populates `process.env` from a `.env` file, if present, then reads it. */
export const loadSessionConfigurationFromEnvironment = (path?: string): SessionConfiguration => {
  loadDotenv(path ? { path } : undefined);
  return loadSessionConfiguration(process.env);
};
