import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Address, BlockRange, ControllerCheckpoint } from '../../types';
import { Logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';

const RangeSchema = z
  .object({
    startBlock: z.number().int().nonnegative(),
    endBlock: z.number().int().nonnegative(),
  })
  .refine((range) => range.startBlock <= range.endBlock, { message: 'startBlock must not exceed endBlock' });

const CheckpointSchema = z.object({
  network: z.string().min(1),
  controller: z.string().min(1),
  lastScannedBlock: z.number().int().nonnegative(),
  unresolvedRanges: z.array(RangeSchema),
  updatedAt: z.string(),
});

const CheckpointFileSchema = z.object({
  version: z.literal(1),
  checkpoints: z.record(CheckpointSchema),
});

const checkpointKey = (network: string, controller: Address): string => `${network}:${controller.toLowerCase()}`;

/**
 * Per-controller scan state carried between runs: how far the last run got and
 * which ranges it could not fetch.
 */
class ScanCheckpointStore {
  private checkpoints = new Map<string, ControllerCheckpoint>();

  constructor(
    private readonly filePath: string,
    private readonly log: Logger,
  ) {}

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      this.log.debug('No scan checkpoints found, starting fresh', { file: this.filePath, reason: describeError(error) });
      this.checkpoints = new Map();
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.warn('Checkpoint file is not valid JSON, ignoring it', { file: this.filePath, error: describeError(error) });
      this.checkpoints = new Map();
      return;
    }

    const result = CheckpointFileSchema.safeParse(parsed);
    if (!result.success) {
      this.log.warn('Checkpoint file failed validation, ignoring it', {
        file: this.filePath,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      this.checkpoints = new Map();
      return;
    }

    this.checkpoints = new Map(
      Object.values(result.data.checkpoints).map((checkpoint) => [
        checkpointKey(checkpoint.network, checkpoint.controller),
        checkpoint,
      ]),
    );
    this.log.info('Loaded scan checkpoints', { file: this.filePath, controllers: this.checkpoints.size });
  }

  get(network: string, controller: Address): ControllerCheckpoint | undefined {
    return this.checkpoints.get(checkpointKey(network, controller));
  }

  record(network: string, controller: Address, lastScannedBlock: number, unresolvedRanges: BlockRange[]): ControllerCheckpoint {
    const previous = this.get(network, controller);
    const checkpoint: ControllerCheckpoint = {
      network,
      controller,
      lastScannedBlock: Math.max(previous?.lastScannedBlock ?? 0, lastScannedBlock),
      unresolvedRanges: unresolvedRanges.map((range) => ({ ...range })),
      updatedAt: new Date().toISOString(),
    };
    this.checkpoints.set(checkpointKey(network, controller), checkpoint);
    return checkpoint;
  }

  all(): ControllerCheckpoint[] {
    return [...this.checkpoints.values()];
  }

  /** Written to a temp file, then renamed over the old one. */
  async save(): Promise<void> {
    const body = {
      version: 1,
      checkpoints: Object.fromEntries(this.checkpoints),
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(body, null, 2), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
    this.log.debug('Saved scan checkpoints', { file: this.filePath, controllers: this.checkpoints.size });
  }
}

export default ScanCheckpointStore;
