export type StageKind = 'static-check' | 'syntax-check' | 'scenario-test';
export type StageSelection = StageKind | 'all';

export type StageOutcome = 'pending' | 'running' | 'passed' | 'failed' | 'skipped';
// A finished execution always resolves to one of these.
export type TerminalOutcome = Extract<StageOutcome, 'passed' | 'failed' | 'skipped'>;

export type StageResult = {
  readonly name: string;
  readonly status: TerminalOutcome;
  /** Wall-clock seconds. */
  readonly duration: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly command: string;
  /** Unit id, or `all` for the whole-tree form of a stage. */
  readonly unit: string;
};

export type PipelineRun = {
  startTime: string;
  endTime: string;
  totalDuration: number;
  stages: StageResult[];
  passed: number;
  failed: number;
  skipped: number;
  overallStatus: 'pending' | 'passed' | 'failed';
};

export type CommandFailure = 'timeout' | 'invocation';

export type CommandOutcome = {
  exitCode: number;
  stdout: string;
  stderr: string;
  failure?: CommandFailure;
};

export type ExecuteOptions = {
  cwd: string;
  env?: Record<string, string>;
};

export type CommandExecutor = {
  readonly dryRun: boolean;
  execute: (command: string, options: ExecuteOptions) => Promise<CommandOutcome>;
  abortAll: () => void;
};

export type CommandTemplates = {
  lint: string;
  strictLint: string;
  syntax: string;
  syntaxAll: string;
  scenario: string;
};

export type ScenarioDriver = 'docker' | 'podman';

export type PipelineConfig = {
  unitsDir: string;
  markerDir: string;
  scenario: string;
  entryFile: string;
  playbooksDir: string;
  reportsDir: string;
  timeoutMs: number;
  driver: ScenarioDriver;
  scenarioEnv: Record<string, string>;
  commands: CommandTemplates;
};

export type UserConfig = Partial<Omit<PipelineConfig, 'commands' | 'scenarioEnv'>> & {
  commands?: Partial<CommandTemplates>;
  scenarioEnv?: Record<string, string>;
};

export type StageContext = {
  root: string;
  config: PipelineConfig;
  executor: CommandExecutor;
};

export type ReportFormat = 'json' | 'junit' | 'html';
export type ResultOrder = 'completion' | 'discovery';

export type RunOptions = {
  stage: StageSelection;
  unit?: string;
  parallelism: number;
  report?: ReportFormat;
  order: ResultOrder;
  verbose: boolean;
  dryRun: boolean;
  cwd: string;
};
