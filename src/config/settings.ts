/**
 * Runtime settings
 * Environment overrides parsed into an immutable snapshot
 */

import { z } from 'zod';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const settingsSchema = z.object({
  PIO_EXECUTABLE: z.string().trim().min(1).optional().catch(undefined),
  ESPIXEL_BUILD_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVEL_NAMES))
    .optional()
    .catch(DEFAULT_LOG_LEVEL),
});

export interface BuildSettings {
  pioExecutable?: string;
  logLevel: LogLevel;
}

/**
 * Read settings from the environment
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Readonly<BuildSettings> {
  const parsed = settingsSchema.parse(env);
  return Object.freeze({
    pioExecutable: parsed.PIO_EXECUTABLE,
    logLevel: parsed.ESPIXEL_BUILD_LOG_LEVEL ?? DEFAULT_LOG_LEVEL,
  });
}
