export { default as PositionLifecycleAnalyzer } from './PositionLifecycleAnalyzer';
export { discountAmount, emptySummary, lossAmount, summarizeEpochs, WAD } from './epochSummary';
