export { RepeatControllerError, isRepeatControllerError } from './error.js';
export {
  PreconditionViolationError,
  AttemptAbortedError,
  type AbortOrigin,
  ProtocolViolationError,
  SequenceExhaustedError,
} from './categories.js';
