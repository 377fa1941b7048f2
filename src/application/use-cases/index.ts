/**
 * Use Cases Barrel Export
 */
export { RunPipelineUseCase } from './run-pipeline.use-case';
