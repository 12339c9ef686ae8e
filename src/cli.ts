import { Command, InvalidArgumentError } from 'commander';
import { NetworkDescriptor, ScanWindow, SkippedNetwork } from './types';
import { ConfigurationError } from './utils/errors';

export interface CliOptions {
  window: ScanWindow;
  networks?: string[];
  outputDir?: string;
}

interface RawCliOptions {
  startDate?: Date;
  endDate?: Date;
  networks?: string[];
  output?: string;
}

const parseDate = (value: string): Date => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`"${value}" is not an ISO date.`);
  }
  return date;
};

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export const buildProgram = (): Command =>
  new Command()
    .name('soft-liquidation-scanner')
    .description('Reconstruct soft-liquidation history of lending controllers across EVM networks')
    .option('--start-date <date>', 'first day of the window (ISO date); full history when omitted', parseDate)
    .option('--end-date <date>', 'exclusive end of the window (ISO date); chain head when omitted', parseDate)
    .option('--networks <names>', 'comma-separated subset of configured networks', parseList)
    .option('--output <dir>', 'directory for the JSON and CSV reports');

export const parseCliOptions = (argv: string[], program: Command = buildProgram()): CliOptions => {
  program.parse(argv, { from: 'user' });
  const options = program.opts<RawCliOptions>();
  return {
    window: { startDate: options.startDate, endDate: options.endDate },
    networks: options.networks,
    outputDir: options.output,
  };
};

/** Narrows the configured networks to the requested ones; unknown names are a configuration error. */
export const selectNetworks = (
  networks: NetworkDescriptor[],
  requested: string[] | undefined,
): { selected: NetworkDescriptor[]; excluded: SkippedNetwork[] } => {
  if (!requested || requested.length === 0) return { selected: networks, excluded: [] };

  const known = new Set(networks.map((network) => network.name));
  const unknown = requested.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown or unusable networks requested: ${unknown.join(', ')}`);
  }

  const wanted = new Set(requested);
  return {
    selected: networks.filter((network) => wanted.has(network.name)),
    excluded: networks
      .filter((network) => !wanted.has(network.name))
      .map((network) => ({ name: network.name, reason: 'not requested' })),
  };
};
