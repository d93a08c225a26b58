import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { parseEnv } from '../env';
import { isErrnoCode } from '../errors';
import type { PlayerOverride } from '../playback/types';

export const DEFAULT_CONFIG_FILE = 'relay_config.json';

export interface RelayConfig {
  host: string;
  port: number;
  audioDir: string;
  ttlSeconds: number;
  sweepIntervalSeconds: number;
  protectedPaths: readonly string[];
  playerOverride: PlayerOverride | null;
  playerTimeoutMs: number;
}

export const DEFAULT_CONFIG: Readonly<RelayConfig> = Object.freeze({
  host: '0.0.0.0',
  port: 8000,
  audioDir: 'audio',
  ttlSeconds: 3600,
  sweepIntervalSeconds: 300,
  protectedPaths: [],
  playerOverride: null,
  playerTimeoutMs: 120_000,
});

const FileConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    audio_cache_dir: z.string().min(1).optional(),
    audio_cache_ttl_seconds: z.number().int().nonnegative().optional(),
    audio_cache_cleanup_interval_seconds: z.number().int().positive().optional(),
    protected_paths: z.array(z.string().min(1)).optional(),
    player_override: z
      .object({
        executable: z.string().min(1),
        args: z.array(z.string()).default([]),
      })
      .optional(),
    player_timeout_ms: z.number().int().positive().optional(),
  })
  .passthrough();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Defaults to RELAY_CONFIG_FILE, then relay_config.json in the working directory. */
  configPath?: string;
}

export function readConfigFile(filePath: string): FileConfig | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid config file ${filePath}: not valid JSON`, { cause: error });
  }

  const parsed = FileConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Builds the process-wide configuration: environment over file over defaults.
 * The result is frozen; changes need a restart.
 */
export function loadRelayConfig(options: LoadConfigOptions = {}): Readonly<RelayConfig> {
  const env = parseEnv(options.env ?? process.env);
  const configPath = path.resolve(options.configPath ?? env.RELAY_CONFIG_FILE ?? DEFAULT_CONFIG_FILE);
  const file: FileConfig = readConfigFile(configPath) ?? {};

  let playerOverride: PlayerOverride | null = file.player_override
    ? { executable: file.player_override.executable, args: file.player_override.args }
    : null;
  if (env.RELAY_PLAYER) {
    playerOverride = { executable: env.RELAY_PLAYER, args: env.RELAY_PLAYER_ARGS ?? [] };
  } else if (env.RELAY_PLAYER_ARGS) {
    if (!playerOverride) {
      throw new Error(
        'Invalid environment variables: RELAY_PLAYER_ARGS: needs RELAY_PLAYER or a player_override in the config file',
      );
    }
    playerOverride = { executable: playerOverride.executable, args: env.RELAY_PLAYER_ARGS };
  }

  const config: RelayConfig = {
    host: env.RELAY_HOST ?? file.host ?? DEFAULT_CONFIG.host,
    port: env.RELAY_PORT ?? file.port ?? DEFAULT_CONFIG.port,
    audioDir: env.RELAY_AUDIO_DIR ?? file.audio_cache_dir ?? DEFAULT_CONFIG.audioDir,
    ttlSeconds: env.RELAY_AUDIO_TTL ?? file.audio_cache_ttl_seconds ?? DEFAULT_CONFIG.ttlSeconds,
    sweepIntervalSeconds:
      env.RELAY_AUDIO_SWEEP_INTERVAL ??
      file.audio_cache_cleanup_interval_seconds ??
      DEFAULT_CONFIG.sweepIntervalSeconds,
    protectedPaths: Object.freeze([...(file.protected_paths ?? DEFAULT_CONFIG.protectedPaths)]),
    playerOverride: playerOverride ? Object.freeze(playerOverride) : null,
    playerTimeoutMs: env.RELAY_PLAYER_TIMEOUT_MS ?? file.player_timeout_ms ?? DEFAULT_CONFIG.playerTimeoutMs,
  };

  return Object.freeze(config);
}

export function writeConfigTemplate(filePath: string = DEFAULT_CONFIG_FILE): void {
  const template = {
    host: DEFAULT_CONFIG.host,
    port: DEFAULT_CONFIG.port,
    audio_cache_dir: DEFAULT_CONFIG.audioDir,
    audio_cache_ttl_seconds: DEFAULT_CONFIG.ttlSeconds,
    audio_cache_cleanup_interval_seconds: DEFAULT_CONFIG.sweepIntervalSeconds,
    protected_paths: [],
    player_timeout_ms: DEFAULT_CONFIG.playerTimeoutMs,
    _comment:
      'TTL is time-to-live in seconds. Stored audio older than this is deleted. Set to 0 to disable cleanup.',
  };
  fs.writeFileSync(filePath, `${JSON.stringify(template, null, 2)}\n`);
}
