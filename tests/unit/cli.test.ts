import { buildProgram, parseCliOptions, selectNetworks } from '../../src/cli';
import { ConfigurationError } from '../../src/utils/errors';
import { createNetwork } from '../utils';

const quietProgram = () =>
  buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });

describe('parseCliOptions', () => {
  test('parses the window, network subset and output directory', () => {
    const options = parseCliOptions(
      ['--start-date', '2024-01-01', '--end-date', '2024-02-01', '--networks', 'ethereum, arbitrum,', '--output', 'out'],
      quietProgram(),
    );

    expect(options).toEqual({
      window: { startDate: new Date('2024-01-01T00:00:00.000Z'), endDate: new Date('2024-02-01T00:00:00.000Z') },
      networks: ['ethereum', 'arbitrum'],
      outputDir: 'out',
    });
  });

  test('leaves everything open without arguments', () => {
    expect(parseCliOptions([], quietProgram())).toEqual({
      window: { startDate: undefined, endDate: undefined },
      networks: undefined,
      outputDir: undefined,
    });
  });

  test('rejects a date that does not parse', () => {
    expect(() => parseCliOptions(['--start-date', 'yesterday-ish'], quietProgram())).toThrow('is not an ISO date');
  });
});

describe('selectNetworks', () => {
  const networks = [createNetwork({ name: 'ethereum' }), createNetwork({ name: 'arbitrum' }), createNetwork({ name: 'optimism' })];

  test('keeps every network when no subset is requested', () => {
    expect(selectNetworks(networks, undefined)).toEqual({ selected: networks, excluded: [] });
  });

  test('excludes networks that were not requested', () => {
    const { selected, excluded } = selectNetworks(networks, ['optimism', 'ethereum']);

    expect(selected.map((network) => network.name)).toEqual(['ethereum', 'optimism']);
    expect(excluded).toEqual([{ name: 'arbitrum', reason: 'not requested' }]);
  });

  test('rejects unknown network names', () => {
    expect(() => selectNetworks(networks, ['ethereum', 'solana'])).toThrow(ConfigurationError);
    expect(() => selectNetworks(networks, ['solana'])).toThrow('Unknown or unusable networks requested: solana');
  });
});
