export * from './types';
export { classify, classifyUrl, isHttpUrl, isMediaFile, titleFromPath, titleFromUrl } from './classify';
export { create, sliceRange } from './expand';
export type { Expander, ExpanderOptions } from './expand';
export { parseBatch, parseCsvLine } from './csv';
export type { Batch, BatchJob } from './csv';
