import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const jsonStringArray = (value: unknown): unknown => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    // left as a string so zod reports it against the field
    return trimmed;
  }
};

const EnvSchema = z.object({
  RELAY_HOST: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  RELAY_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).optional()),
  RELAY_CONFIG_FILE: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  RELAY_AUDIO_DIR: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  RELAY_AUDIO_TTL: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().optional()),
  RELAY_AUDIO_SWEEP_INTERVAL: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional(),
  ),
  RELAY_PLAYER: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  RELAY_PLAYER_ARGS: z.preprocess(jsonStringArray, z.array(z.string()).optional()),
  RELAY_PLAYER_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional(),
  ),
});

export type RelayEnv = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): RelayEnv {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}
