import { parseArgs } from 'node:util';

import { getErrorMessage } from './utils/error-utils.js';

/** What the process was asked to do. */
export type CliCommand =
  | { readonly kind: 'serve'; readonly configPath: string | undefined }
  | { readonly kind: 'check'; readonly configPath: string | undefined }
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | { readonly kind: 'invalid'; readonly message: string };

interface OptionHelp {
  readonly flags: string;
  readonly summary: string;
}

const options = {
  config: { type: 'string', short: 'c' },
  test: { type: 'boolean', short: 't', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

const optionHelp: readonly OptionHelp[] = [
  {
    flags: '-c, --config <path>',
    summary: 'Gateway configuration file (default: $PORTICO_CONFIG, then ./config.yaml)',
  },
  { flags: '-t, --test', summary: 'Validate the configuration file and exit' },
  { flags: '-h, --help', summary: 'Print this help and exit' },
  { flags: '-v, --version', summary: 'Print the gateway version and exit' },
];

export function renderCliUsage(): string {
  const width = Math.max(...optionHelp.map((entry) => entry.flags.length)) + 2;
  const lines = [
    'portico: multi-host HTTP gateway',
    '',
    'Usage: portico [options]',
    '',
    'Options:',
    ...optionHelp.map((entry) => `  ${entry.flags.padEnd(width)}${entry.summary}`),
    '',
    'Signals:',
    '  SIGHUP           Reload the configuration file',
    '  SIGINT, SIGTERM  Drain connections and exit',
    '',
  ];
  return lines.join('\n');
}

/** `--help` wins over `--version`, which wins over `--test`. */
export function parseCliArgs(args: readonly string[]): CliCommand {
  try {
    const { values } = parseArgs({
      args: [...args],
      options,
      strict: true,
      allowPositionals: false,
    });

    if (values.help) return { kind: 'help' };
    if (values.version) return { kind: 'version' };
    return {
      kind: values.test ? 'check' : 'serve',
      configPath: values.config,
    };
  } catch (error: unknown) {
    return { kind: 'invalid', message: getErrorMessage(error) };
  }
}
