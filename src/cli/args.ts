import type { ReportFormat, ResultOrder, ScenarioDriver, StageSelection } from '@pipeline/types';

export type CLIOptions = {
  stage?: StageSelection;
  unit?: string;
  parallel?: number;
  report?: ReportFormat;
  order?: ResultOrder;
  scenario?: string;
  driver?: ScenarioDriver;
  verbose?: boolean;
  dryRun?: boolean;
  list?: boolean;
  help?: boolean;
  version?: boolean;
  cwd?: string;
};

export type Command = 'run' | 'list';

const STAGES: readonly StageSelection[] = ['static-check', 'syntax-check', 'scenario-test', 'all'];
const REPORTS: readonly ReportFormat[] = ['json', 'junit', 'html'];

function oneOf<T extends string>(allowed: readonly T[], v: string): T | undefined {
  return allowed.find((a) => a === v);
}

export function parseArgs(argv: string[]): { cmd: Command; opts: CLIOptions; errors: string[] } {
  const args = argv.slice(2);
  const opts: CLIOptions = {};
  const errors: string[] = [];
  const invalid = (k: string, v: string) => errors.push(`Invalid value for ${k}: ${v}`);

  for (const a of args) {
    if (!a.startsWith('-')) {
      continue;
    }
    const eq = a.indexOf('=');
    const k = eq === -1 ? a : a.slice(0, eq);
    const v = eq === -1 ? 'true' : a.slice(eq + 1);
    if (k === '--stage' || k === '-s') {
      const stage = oneOf(STAGES, v);
      if (stage) {
        opts.stage = stage;
      } else {
        invalid(k, v);
      }
    } else if (k === '--unit' || k === '--role' || k === '-r') {
      opts.unit = v;
    } else if (k === '--parallel' || k === '-p') {
      const n = Number(v);
      if (Number.isInteger(n) && n > 0) {
        opts.parallel = n;
      } else {
        invalid(k, v);
      }
    } else if (k === '--report') {
      const report = oneOf(REPORTS, v);
      if (report) {
        opts.report = report;
      } else {
        invalid(k, v);
      }
    } else if (k === '--order') {
      const order = oneOf(['completion', 'discovery'] as const, v);
      if (order) {
        opts.order = order;
      } else {
        invalid(k, v);
      }
    } else if (k === '--scenario') {
      opts.scenario = v;
    } else if (k === '--driver') {
      const driver = oneOf(['docker', 'podman'] as const, v);
      if (driver) {
        opts.driver = driver;
      } else {
        invalid(k, v);
      }
    } else if (k === '--verbose' || k === '-v') {
      opts.verbose = v !== 'false';
    } else if (k === '--dry-run') {
      opts.dryRun = v !== 'false';
    } else if (k === '--list' || k === '--list-units') {
      opts.list = v !== 'false';
    } else if (k === '--cwd') {
      opts.cwd = v;
    } else if (k === '--help' || k === '-h') {
      opts.help = true;
    } else if (k === '--version') {
      opts.version = true;
    } else {
      errors.push(`Unknown option: ${k}`);
    }
  }

  const first = args.find((a) => !a.startsWith('-')) ?? 'run';
  const cmd: Command = first === 'list' || opts.list ? 'list' : 'run';
  if (first !== 'run' && first !== 'list') {
    errors.push(`Unknown command: ${first}`);
  }
  return { cmd, opts, errors };
}

export const HELP = [
  'Usage: role-pipeline [run|list] [options]',
  '',
  'Commands:',
  '  run             Run the pipeline (default)',
  '  list            Print discovered units and exit',
  '',
  'Options:',
  '  --stage=static-check|syntax-check|scenario-test|all   (default: all)',
  '  --unit=<category/name>   Run a single unit',
  '  --parallel=n             Parallel jobs for lint and syntax stages (default: 4)',
  '  --report=json|junit|html Write a report to the reports directory',
  '  --order=completion|discovery  Result order in reports (default: completion)',
  '  --scenario=<name>        Scenario to test (default: default)',
  '  --driver=docker|podman   Container driver for scenario tests',
  '  --verbose, -v            Show output previews',
  '  --dry-run                Print commands instead of running them',
  '  --list                   Same as the list command',
  '  --cwd=path               Project root (default: current directory)',
  '  --help, -h               Show this help message',
  '  --version                Show version number',
].join('\n');
