import path from 'path';
import { parseArgs } from 'util';
import { isColorSupported } from 'colorette';
import { describeError, UsageError } from '../common/errors';

export interface InspectorConfig {
  filePath: string;
  outputDir: string;
  listOnly: boolean;
  verbose: boolean;
  useColor: boolean;
  showHelp: boolean;
}

export const USAGE = `Usage: container-inspector <filepath> [options]

Identifies and extracts embedded files from container formats (ZIP, JAR, OLE).

Options:
  -o, --output <dir>  Output directory for extracted files (default: current directory)
  -l, --list          List embedded files without extracting
  -v, --verbose       Enable debug logging
      --no-color      Disable coloured output
  -h, --help          Show this message

Environment:
  CONTAINER_INSPECTOR_OUTPUT   Default output directory
  CONTAINER_INSPECTOR_VERBOSE  Enable debug logging (1/true/yes/on)`;

export const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const parseCliArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: 'string', short: 'o' },
        list: { type: 'boolean', short: 'l', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        'no-color': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error: unknown) {
    throw new UsageError(describeError(error));
  }
};

export const resolveInspectorConfig = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): InspectorConfig => {
  const { values, positionals } = parseCliArgs(argv);
  const showHelp = values.help === true;

  if (positionals.length > 1) {
    throw new UsageError(`Expected one container file, got ${positionals.length}`);
  }
  const [filePath = ''] = positionals;
  if (!filePath && !showHelp) {
    throw new UsageError('Missing container file path');
  }

  const outputDir = values.output ?? env.CONTAINER_INSPECTOR_OUTPUT ?? '.';

  return {
    filePath: filePath ? path.resolve(cwd, filePath) : '',
    outputDir: path.resolve(cwd, outputDir),
    listOnly: values.list === true,
    verbose: values.verbose === true || coerceBoolean(env.CONTAINER_INSPECTOR_VERBOSE),
    useColor: values['no-color'] !== true && isColorSupported,
    showHelp,
  };
};
