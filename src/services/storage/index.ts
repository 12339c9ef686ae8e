export { default as ScanCheckpointStore } from './ScanCheckpointStore';
