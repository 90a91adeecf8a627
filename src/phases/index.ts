export * as Expand from './expand';
export * as Acquire from './acquire';
export * as Plan from './plan';
export * as Refine from './refine';
export * as Cleanup from './cleanup';
export * as Complete from './complete';
