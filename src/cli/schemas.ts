/**
 * CLI Schemas
 * Zod schemas for values handed over by the argument parser
 */

import { z } from 'zod';
import type { BuildOptions } from '../types.js';
import { DEFAULT_TARGET } from '../config/targets.js';

// Raw commander option values; toggles are absent unless passed
export const cliOptionsSchema = z
  .object({
    board: z.string().optional().default(DEFAULT_TARGET),
    clean: z.boolean().optional().default(false),
    upload: z.boolean().optional().default(false),
    uploadFs: z.boolean().optional().default(false),
    monitor: z.boolean().optional().default(false),
  })
  .transform(
    (raw): BuildOptions => ({
      target: raw.board,
      cleanBuild: raw.clean,
      uploadFirmware: raw.upload,
      uploadFilesystem: raw.uploadFs,
      startMonitor: raw.monitor,
    }),
  );
