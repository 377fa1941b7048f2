/**
 * Input Ports (Driving Ports) Barrel Export
 */
export type {
  RunPipelineCommand,
  RunPipelineResult,
  RunPipelinePort,
} from './run-pipeline.port';
