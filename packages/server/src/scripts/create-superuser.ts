#!/usr/bin/env node
/**
 * Create an administrative user.
 *
 * Usage:
 *   create-superuser --email admin@example.com --password <password> [--name Admin]
 *
 * Uses DATABASE_PATH and BCRYPT_ROUNDS from the environment.
 */
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { loadConfig } from '../config.js';
import { openDatabase } from '../db/index.js';
import { createServices } from '../services/index.js';
import { createUserSchema } from '../schemas/index.js';
import type { User } from '../types/index.js';

const superuserArgsSchema = createUserSchema
  .pick({ email: true, password: true })
  .extend({ name: z.string().trim().max(255) });

export async function createSuperuser(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<User> {
  const { values } = parseArgs({
    args: argv,
    options: {
      email: { type: 'string' },
      password: { type: 'string' },
      name: { type: 'string', default: '' },
    },
    strict: true,
  });
  const input = superuserArgsSchema.parse(values);
  const config = loadConfig(env);

  const db = openDatabase(config.databasePath);
  try {
    const { users } = createServices(db, {
      mediaRoot: config.mediaRoot,
      mediaUrl: config.mediaUrl,
      bcryptRounds: config.bcryptRounds,
    });
    return await users.createSuperuser(input);
  } finally {
    db.close();
  }
}

async function main(): Promise<void> {
  const user = await createSuperuser(process.argv.slice(2));
  console.log(`Superuser ${user.email} created (id ${String(user.id)})`);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error('Could not create superuser:', err);
    process.exit(1);
  });
}
