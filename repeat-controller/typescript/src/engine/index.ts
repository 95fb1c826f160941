export { RepeatDecisionEngine } from './engine.js';
export type {
  AttemptContext,
  EnginePhase,
  FatalReason,
  FailureDecision,
  NonFatalDecision,
  RunVerdict,
  RunSummary,
} from './types.js';
