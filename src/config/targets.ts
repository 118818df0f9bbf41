/**
 * Target profiles
 * The closed set of PlatformIO environments this project builds for
 */

import { z } from 'zod';
import type { BuildConfiguration, BuildOptions } from '../types.js';
import { ValidationError } from '../utils/errors.js';

export const TARGET_PROFILES = [
  'd1_mini',
  'd1_mini_pro',
  'espsv3',
  'esp01s',
  'd1_mini32',
  'd32_pro',
  'esp32_cam',
] as const;

export type TargetProfile = (typeof TARGET_PROFILES)[number];

export const HARDWARE_FAMILIES = ['esp8266', 'esp32'] as const;

export type HardwareFamily = (typeof HARDWARE_FAMILIES)[number];

export const DEFAULT_TARGET: TargetProfile = 'd1_mini';

export const TARGET_FAMILIES: Readonly<Record<TargetProfile, HardwareFamily>> = {
  d1_mini: 'esp8266',
  d1_mini_pro: 'esp8266',
  espsv3: 'esp8266',
  esp01s: 'esp8266',
  d1_mini32: 'esp32',
  d32_pro: 'esp32',
  esp32_cam: 'esp32',
};

export const FAMILY_LABELS: Readonly<Record<HardwareFamily, string>> = {
  esp8266: 'ESP8266',
  esp32: 'ESP32',
};

export const targetProfileSchema = z.enum(TARGET_PROFILES);

/**
 * Group profiles by hardware family, keeping declaration order
 */
export function profilesByFamily(): Record<HardwareFamily, TargetProfile[]> {
  const groups: Record<HardwareFamily, TargetProfile[]> = { esp8266: [], esp32: [] };
  for (const profile of TARGET_PROFILES) {
    groups[TARGET_FAMILIES[profile]].push(profile);
  }
  return groups;
}

/**
 * Narrow resolved options to a build configuration
 * @throws ValidationError when the target is not a supported profile
 */
export function validateTarget(options: BuildOptions): Readonly<BuildConfiguration> {
  const result = targetProfileSchema.safeParse(options.target);
  if (!result.success) {
    throw new ValidationError(options.target, TARGET_PROFILES);
  }
  return Object.freeze({ ...options, target: result.data });
}
