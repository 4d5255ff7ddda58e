import { z } from 'zod';

const intFromEnv = (fallback: number): z.ZodDefault<z.ZodNumber> =>
  z.coerce.number().int().default(fallback);

const configSchema = z.object({
  PORT: intFromEnv(3001).pipe(z.number().min(1).max(65535)),
  DATABASE_PATH: z.string().min(1).default('data/cookbook.db'),
  MEDIA_ROOT: z.string().min(1).default('data/media'),
  MEDIA_URL: z
    .string()
    .regex(/^\//, 'MEDIA_URL must start with "/"')
    .default('/media'),
  BCRYPT_ROUNDS: intFromEnv(10).pipe(z.number().min(4).max(15)),
  MAX_IMAGE_BYTES: intFromEnv(5 * 1024 * 1024).pipe(z.number().positive()),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  mediaRoot: string;
  mediaUrl: string;
  bcryptRounds: number;
  maxImageBytes: number;
}

/** Read settings from the environment. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = configSchema.parse(env);
  return Object.freeze({
    port: parsed.PORT,
    databasePath: parsed.DATABASE_PATH,
    mediaRoot: parsed.MEDIA_ROOT,
    mediaUrl: parsed.MEDIA_URL.replace(/\/+$/, '') || '/',
    bcryptRounds: parsed.BCRYPT_ROUNDS,
    maxImageBytes: parsed.MAX_IMAGE_BYTES,
  });
}
