export * from './types';
export * from './collaborators';
export { assignIdentities } from './tasks';
export { create, resolvePoolSizes } from './coordinator';
export type { Coordinator, CoordinatorOptions, PoolSizes } from './coordinator';
export { joinTranscripts, workRoot } from './worker';
