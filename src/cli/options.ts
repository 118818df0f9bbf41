/**
 * Option Resolver
 * Turns the argument vector into build options, a help request or a usage error
 */

import { Command, CommanderError } from 'commander';
import type { BuildOptions } from '../types.js';
import {
  DEFAULT_TARGET,
  FAMILY_LABELS,
  HARDWARE_FAMILIES,
  profilesByFamily,
} from '../config/targets.js';
import { UsageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { cliOptionsSchema } from './schemas.js';

const logger = createLogger('Options');

export const PROGRAM_NAME = 'espixel-build';

export type OptionResolution =
  | { kind: 'help' }
  | { kind: 'build'; options: BuildOptions };

// A fresh instance per call: commander keeps parsed values on the command
function createProgram(): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Build, package and deploy ESPixelStick firmware with PlatformIO')
    .helpOption(false)
    .option('-b, --board <name>', 'Target board', DEFAULT_TARGET)
    .option('-c, --clean', 'Clean build before compiling')
    .option('-u, --upload', 'Upload firmware after build')
    .option('-f, --upload-fs', 'Upload filesystem after build')
    .option('-m, --monitor', 'Start serial monitor after operations')
    .option('-h, --help', 'Show this help message')
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });
}

// Short flag clusters whose last letter is -b take the next token as the board
const BOARD_CLUSTER = /^-[cufmh]*b$/;

/**
 * Index of a bare `--` that is not a board value, or -1.
 * commander reads it as the end of options; here it is an unknown token.
 */
function findSeparator(argv: readonly string[]): number {
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '--') return i;
    if (token === '--board' || BOARD_CLUSTER.test(token)) i++;
  }
  return -1;
}

/**
 * Resolve options from arguments (without the node and script entries)
 * @throws UsageError for unknown tokens or a flag missing its value
 */
export function resolveOptions(argv: readonly string[]): OptionResolution {
  const separator = findSeparator(argv);
  if (separator !== -1) {
    // Help and earlier problems still take precedence
    const head = resolveOptions(argv.slice(0, separator));
    if (head.kind === 'help') return head;
    throw new UsageError('--', 'Unknown option: --');
  }

  const program = createProgram();
  let parseError: CommanderError | undefined;

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    parseError = error;
  }

  const values = program.opts();
  if (values.help === true) {
    return { kind: 'help' };
  }

  if (parseError) {
    logger.debug('Argument parsing stopped', { code: parseError.code, argv });
    if (parseError.code === 'commander.optionMissingArgument') {
      // Only the final token can be missing its value
      const token = argv[argv.length - 1] ?? '';
      throw new UsageError(token, `Missing value for option: ${token}`);
    }
    throw new UsageError('', parseError.message);
  }

  // Operands and unknown options, leftmost first
  const [unexpected] = program.args;
  if (unexpected !== undefined) {
    throw new UsageError(unexpected, `Unknown option: ${unexpected}`);
  }

  return { kind: 'build', options: cliOptionsSchema.parse(values) };
}

export function formatUsage(): string {
  const groups = profilesByFamily();
  const boards = HARDWARE_FAMILIES.map(
    (family) => `  ${groups[family].join(', ')} (${FAMILY_LABELS[family]})`,
  );

  return [
    createProgram().helpInformation().trimEnd(),
    '',
    'Supported boards:',
    ...boards,
    '',
    'Examples:',
    `  ${PROGRAM_NAME} -b espsv3 -c -u -f`,
    `  ${PROGRAM_NAME} --board d1_mini32 --clean --upload --monitor`,
  ].join('\n');
}
