export * from './types';
export { createRefinementTasks, outputFileName } from './tasks';
export type { TaskPlan } from './tasks';
export { buildPrompts, splitIntoChunks, countWords, refine, CONTINUATION_NOTE } from './refiner';
export { parseEnhancement, mergeEnhancement, buildEnhancementPrompt } from './enhancer';
export type { Enhancement } from './enhancer';
export { create } from './coordinator';
export type { Coordinator, CoordinatorOptions } from './coordinator';
