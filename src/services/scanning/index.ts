export { default as BlockRangeResolver } from './BlockRangeResolver';
export type { ActivityClamp, BlockSearchOutcome } from './BlockRangeResolver';
export { default as ChunkedLogScanner, coalesceRanges } from './ChunkedLogScanner';
