export { discoverUnits, unitPath } from './core/discovery';
export { ConfigError, PipelineInterruptedError } from './core/errors';
export { createCommandExecutor, DEFAULT_TIMEOUT_MS } from './core/executor';
export { runPipeline } from './core/pipeline';
export {
  renderHtmlReport,
  renderJsonReport,
  renderJunitReport,
  writeReport,
} from './core/reporters';
export {
  createPipelineRun,
  finalizeRun,
  orderResults,
  recordResult,
  summarizeResults,
} from './core/result-aggregator';
export { runStage, STAGE_ORDER } from './core/scheduler';
export { mergeConfig, moleculePreset } from './presets/molecule';
export { runScenarioTest, runStaticCheck, runSyntaxCheck } from './stages';
export type {
  CommandExecutor,
  CommandOutcome,
  PipelineConfig,
  PipelineRun,
  StageKind,
  StageOutcome,
  StageResult,
  StageSelection,
  UserConfig,
} from './types';
