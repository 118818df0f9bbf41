import { describe, it, expect } from 'vitest';
import { cliOptionsSchema } from '../src/cli/schemas.js';

describe('CLI Schemas', () => {
  describe('cliOptionsSchema', () => {
    it('should apply defaults to absent toggles', () => {
      const result = cliOptionsSchema.safeParse({ board: 'espsv3' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          target: 'espsv3',
          cleanBuild: false,
          uploadFirmware: false,
          uploadFilesystem: false,
          startMonitor: false,
        });
      }
    });

    it('should default the board', () => {
      const result = cliOptionsSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.target).toBe('d1_mini');
      }
    });

    it('should map commander names to configuration fields', () => {
      const result = cliOptionsSchema.safeParse({
        board: 'd1_mini32',
        clean: true,
        upload: true,
        uploadFs: true,
        monitor: true,
        help: false,
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          target: 'd1_mini32',
          cleanBuild: true,
          uploadFirmware: true,
          uploadFilesystem: true,
          startMonitor: true,
        });
      }
    });

    it('should reject a non-string board', () => {
      expect(cliOptionsSchema.safeParse({ board: 42 }).success).toBe(false);
    });
  });
});
