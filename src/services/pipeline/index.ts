export { default as NetworkScanWorker } from './NetworkScanWorker';
export type { NetworkScanDependencies } from './NetworkScanWorker';
export { default as ScanOrchestrator } from './ScanOrchestrator';
export type { ScanOrchestratorOptions } from './ScanOrchestrator';
