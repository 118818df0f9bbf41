/**
 * Project layout
 * Paths the orchestrator checks, reads and writes, relative to the project root
 */

import type { ProjectLayout } from '../types.js';

export const PLATFORMIO_MARKER = 'platformio.ini';

export const REQUIRED_FILES = [
  'src/main.cpp',
  'src/SerialConsole.hpp',
  'src/SerialConsole.cpp',
  'src/LEDEffects.hpp',
  'src/LEDEffects.cpp',
  'src/WebMgr.cpp',
  'html/console.html',
  'html/effects_enhanced.html',
  'html/index.html',
] as const;

export const ASSET_SOURCES = [
  { dir: 'html', extension: '.html' },
  { dir: 'html/css', extension: '.css' },
  { dir: 'html/js', extension: '.js' },
] as const;

export const STAGING_DIR = 'data/www';

export const PROJECT_LAYOUT: Readonly<ProjectLayout> = Object.freeze({
  markerFile: PLATFORMIO_MARKER,
  requiredFiles: REQUIRED_FILES,
  assetSources: ASSET_SOURCES,
  stagingDir: STAGING_DIR,
});

export const MONITOR_BAUD = 115200;

// Printed after a successful build
export const DEVICE_LINKS = [
  'Access web interface at http://[DEVICE_IP]/',
  'Access serial console at http://[DEVICE_IP]/console',
  'Access enhanced effects at http://[DEVICE_IP]/effects_enhanced.html',
  'Test API with: curl http://[DEVICE_IP]/api/effects',
] as const;
