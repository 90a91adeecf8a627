export * from './types';
export { create, StationError, FlowLoopError } from './engine';
export type { StationPhase } from './engine';
