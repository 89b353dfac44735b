import { parseArgs } from 'node:util';

export const USAGE = `Usage: oscnode [--verbose]

UDP OSC node exchanging parameters and sensor frames with a real-time patch.
Ports, sensor URL and the optional status API are configured through the
environment (see .env.example).

Options:
  -v, --verbose  Emit debugging output.
  -h, --help     Show this message.`;

export interface CliOptions {
  verbose: boolean;
  help: boolean;
}

/**
 * Parse command line flags.
 *
 * @throws {TypeError} on unknown flags or positional arguments.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });
  return {
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}
