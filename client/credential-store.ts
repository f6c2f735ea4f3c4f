import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

import type { EnvironmentSource, SessionConfiguration } from "./session-config";

const TOKEN_FILE = "token.json";
const USERNAME_FILE = "username.txt";
const APPLICATION_DIRECTORY = "WarRumble";
const DEFAULT_VALIDATION_TIMEOUT_MS = 5000;

export interface StoredCredentials {
  readonly token: string | null;
  readonly username: string | null;
}

export interface CredentialUpdate {
  readonly token?: string;
  readonly username?: string;
}

export interface CredentialStore {
  readonly load: () => Promise<StoredCredentials>;
  readonly save: (update: CredentialUpdate) => Promise<void>;
  readonly clear: () => Promise<void>;
}

const normalizeStoredValue = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/** OS configuration root: `%APPDATA%`, `~/Library/Application Support` or `$XDG_CONFIG_HOME`. */
export const resolveUserConfigDirectory = (
  env: EnvironmentSource,
  platform: NodeJS.Platform,
  home: string,
): string => {
  if (platform === "win32") {
    return normalizeStoredValue(env.APPDATA) ?? join(home, "AppData", "Roaming");
  }
  if (platform === "darwin") {
    return join(home, "Library", "Application Support");
  }
  return normalizeStoredValue(env.XDG_CONFIG_HOME) ?? join(home, ".config");
};

export const resolveCredentialDirectory = (
  configuration: Pick<SessionConfiguration, "configDirectory" | "profile">,
  env: EnvironmentSource = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string =>
  configuration.configDirectory ??
  join(resolveUserConfigDirectory(env, platform, home), APPLICATION_DIRECTORY, configuration.profile);

/** Token and username as two owner-only files in a per-profile directory. */
export class FileCredentialStore implements CredentialStore {
  constructor(public readonly directory: string) {}

  async load(): Promise<StoredCredentials> {
    const [token, username] = await Promise.all([
      this.readEntry(TOKEN_FILE),
      this.readEntry(USERNAME_FILE),
    ]);
    return { token, username };
  }

  async save(update: CredentialUpdate): Promise<void> {
    await mkdir(this.directory, { recursive: true, mode: 0o755 });
    if (update.token !== undefined) {
      await this.writeEntry(TOKEN_FILE, update.token);
    }
    if (update.username !== undefined) {
      await this.writeEntry(USERNAME_FILE, update.username);
    }
  }

  async clear(): Promise<void> {
    await Promise.all([
      rm(join(this.directory, TOKEN_FILE), { force: true }),
      rm(join(this.directory, USERNAME_FILE), { force: true }),
    ]);
  }

  private async readEntry(name: string): Promise<string | null> {
    try {
      return normalizeStoredValue(await readFile(join(this.directory, name), "utf8"));
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async writeEntry(name: string, value: string): Promise<void> {
    await writeFile(join(this.directory, name), value.trim(), { mode: 0o600 });
  }
}

export class InMemoryCredentialStore implements CredentialStore {
  private token: string | null;
  private username: string | null;

  constructor(initial: Partial<StoredCredentials> = {}) {
    this.token = normalizeStoredValue(initial.token);
    this.username = normalizeStoredValue(initial.username);
  }

  async load(): Promise<StoredCredentials> {
    return { token: this.token, username: this.username };
  }

  async save(update: CredentialUpdate): Promise<void> {
    if (update.token !== undefined) {
      this.token = normalizeStoredValue(update.token);
    }
    if (update.username !== undefined) {
      this.username = normalizeStoredValue(update.username);
    }
  }

  async clear(): Promise<void> {
    this.token = null;
    this.username = null;
  }
}

export type CredentialValidation =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

export interface CredentialValidator {
  readonly validate: (token: string) => Promise<CredentialValidation>;
}

export interface HttpCredentialValidatorOptions {
  readonly apiBase: string;
  readonly fetch?: typeof fetch;
  readonly timeoutMs?: number;
}

/**
 * Calls the profile endpoint with the token. Only a 401 marks the token
 * invalid on an answered request; an unreachable server also counts as invalid.
 */
export class HttpCredentialValidator implements CredentialValidator {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpCredentialValidatorOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async validate(token: string): Promise<CredentialValidation> {
    const trimmed = token.trim();
    if (trimmed.length === 0) {
      return { valid: false, reason: "no token available" };
    }

    const fetchImpl = this.fetchImpl;
    try {
      const response = await fetchImpl(`${this.options.apiBase}/api/profile`, {
        method: "GET",
        headers: { Authorization: `Bearer ${trimmed}` },
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS),
      });
      if (response.status === 401) {
        return { valid: false, reason: "token expired or invalid" };
      }
      return { valid: true };
    } catch (error) {
      return { valid: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }
}
