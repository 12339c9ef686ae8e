#!/usr/bin/env node
import { loadConfig, loadNetworks } from './config';
import { configureLogger, logger } from './utils/logger';
import { describeError } from './utils/errors';
import { parseCliOptions, selectNetworks } from './cli';
import { ScanOrchestrator } from './services/pipeline';
import { ScanCheckpointStore } from './services/storage';
import { ReportWriter } from './services/reporting';

async function main(): Promise<number> {
  const config = loadConfig();
  configureLogger(config);
  const cli = parseCliOptions(process.argv.slice(2));
  const { networks, skipped } = loadNetworks(config.networksFile);
  const { selected, excluded } = selectNetworks(networks, cli.networks);

  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}, cancelling scan; partial results will still be written`);
    abort.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const checkpoints = new ScanCheckpointStore(config.checkpointFile, logger);
  await checkpoints.load();

  const orchestrator = new ScanOrchestrator(config, { checkpoints });
  const report = await orchestrator.run(selected, [...skipped, ...excluded], cli.window, abort.signal);

  const writer = new ReportWriter(cli.outputDir ?? config.outputDir);
  await writer.write(report);

  process.removeListener('SIGINT', onSignal);
  process.removeListener('SIGTERM', onSignal);
  return report.cancelled ? 130 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('Fatal error', { error: describeError(err) });
    process.exitCode = 1;
  });
