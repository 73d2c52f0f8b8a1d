export { QualityGate } from './quality-gate';
export type {
  QualityGateOptions,
  QualityGateResult,
  QualityVerdict,
  RejectedChunk,
} from './quality-gate';
