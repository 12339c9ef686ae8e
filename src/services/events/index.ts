export { default as EventNormalizer } from './EventNormalizer';
export type { NormalizedBatch, NormalizeOutcome, NormalizerController, NormalizerCounts, UserStateSnapshot } from './EventNormalizer';
export { compareCanonical, logIdentity } from './ordering';
