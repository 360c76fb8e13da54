import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import {
  ConfigError,
  PLATFORMS,
  PLATFORM_LABELS,
  fail,
  isPlaceholderCredential,
  maskSecret,
  ok,
  toErrorMessage,
  type Platform,
  type PlatformCredentials,
  type Result,
} from '@cross-poster/shared';

export type Env = Record<string, string | undefined>;

/**
 * Written by `config init`. Template values are rejected until replaced.
 */
export const CONFIG_TEMPLATE = {
  devto: { api_key: 'your_dev_to_api_key_here' },
  medium: { access_token: 'your_medium_access_token_here' },
};

const ConfigFileSchema = z.object({
  devto: z.object({ api_key: z.string().optional() }).optional(),
  medium: z.object({ access_token: z.string().optional() }).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type CredentialSource = 'env' | 'file' | 'none';

export interface ResolvedSecret {
  value?: string;
  source: CredentialSource;
}

export interface AppConfig {
  path: string;
  exists: boolean;
  devto: ResolvedSecret;
  medium: ResolvedSecret;
}

const ENV_KEYS: Record<Platform, string> = {
  devto: 'DEVTO_API_KEY',
  medium: 'MEDIUM_ACCESS_TOKEN',
};

const FILE_FIELDS: Record<Platform, string> = {
  devto: 'api_key',
  medium: 'access_token',
};

/**
 * Location of the config file: $CROSS_POSTER_CONFIG, else
 * <$XDG_CONFIG_HOME or ~/.config>/cross-poster/config.json
 */
export function getConfigPath(env: Env = process.env): string {
  if (env.CROSS_POSTER_CONFIG) return path.resolve(env.CROSS_POSTER_CONFIG);
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'cross-poster', 'config.json');
}

/**
 * Read and validate the config file. A missing file is not an error.
 */
export async function readConfigFile(configPath: string): Promise<Result<ConfigFile | null>> {
  let raw: unknown;
  try {
    if (!(await fs.pathExists(configPath))) return ok(null);
    raw = await fs.readJson(configPath);
  } catch (error) {
    return fail(
      new ConfigError(`Cannot read config file "${configPath}": ${toErrorMessage(error)}`, {
        cause: error,
      })
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    return fail(new ConfigError(`Invalid config file "${configPath}": ${detail}`));
  }
  return ok(parsed.data);
}

function resolveSecret(envValue: string | undefined, fileValue: string | undefined): ResolvedSecret {
  if (envValue?.trim()) return { value: envValue, source: 'env' };
  if (fileValue !== undefined) return { value: fileValue, source: 'file' };
  return { source: 'none' };
}

/**
 * Merge the config file with environment overrides
 */
export async function loadConfig(env: Env = process.env): Promise<Result<AppConfig>> {
  const configPath = getConfigPath(env);
  const file = await readConfigFile(configPath);
  if (!file.success) return file;

  return ok({
    path: configPath,
    exists: file.data !== null,
    devto: resolveSecret(env[ENV_KEYS.devto], file.data?.devto?.api_key),
    medium: resolveSecret(env[ENV_KEYS.medium], file.data?.medium?.access_token),
  });
}

/**
 * Credentials for one platform. Placeholder checks happen when the client is built.
 */
export function credentialsFor(config: AppConfig, platform: Platform): Result<PlatformCredentials> {
  const secret = config[platform];
  if (secret.value === undefined) {
    return fail(
      new ConfigError(
        `No ${PLATFORM_LABELS[platform]} ${FILE_FIELDS[platform]} configured. ` +
          `Set ${ENV_KEYS[platform]} or add ${platform}.${FILE_FIELDS[platform]} to ${config.path}`
      )
    );
  }

  switch (platform) {
    case 'devto':
      return ok({ platform, apiKey: secret.value });
    case 'medium':
      return ok({ platform, accessToken: secret.value });
  }
}

/**
 * Write the placeholder template with owner-only permissions. Never overwrites.
 */
export async function initConfig(
  configPath: string
): Promise<Result<{ path: string; created: boolean }>> {
  try {
    if (await fs.pathExists(configPath)) return ok({ path: configPath, created: false });

    await fs.outputFile(configPath, `${JSON.stringify(CONFIG_TEMPLATE, null, 2)}\n`, {
      mode: 0o600,
    });
    // The umask can strip bits from the create mode
    await fs.chmod(configPath, 0o600);
    return ok({ path: configPath, created: true });
  } catch (error) {
    return fail(
      new ConfigError(`Cannot write config file "${configPath}": ${toErrorMessage(error)}`, {
        cause: error,
      })
    );
  }
}

export interface ConfigSummaryEntry {
  platform: Platform;
  field: string;
  source: CredentialSource;
  value: string;
  placeholder: boolean;
}

/**
 * Masked view of the configured credentials, safe to print
 */
export function describeConfig(config: AppConfig): ConfigSummaryEntry[] {
  return PLATFORMS.map(platform => {
    const secret = config[platform];
    return {
      platform,
      field: FILE_FIELDS[platform],
      source: secret.source,
      value: secret.value === undefined ? '(not set)' : maskSecret(secret.value),
      placeholder: secret.value !== undefined && isPlaceholderCredential(secret.value),
    };
  });
}
