export { products } from './products.js';
export type { Product, NewProduct } from './products.js';

export { pipelineRuns } from './pipeline-runs.js';
export type { PipelineRun, NewPipelineRun } from './pipeline-runs.js';
