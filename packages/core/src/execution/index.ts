export {
  ExecutionBridge,
  type ExecutionBridgeOptions,
  type ExecutionEvents,
  type QueryEvent,
  type QueryErrorEvent,
} from './execution-bridge';
export type {
  BlockingExecutor,
  CallingConvention,
  Executor,
  NonBlockingExecutor,
  RawResult,
} from './executor';
