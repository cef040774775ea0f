import { DEFAULT_TIMEOUT_MS } from '@pipeline/core/executor';
import type { PipelineConfig, UserConfig } from '@pipeline/types';

export function moleculePreset(): PipelineConfig {
  return {
    unitsDir: 'roles',
    markerDir: 'molecule',
    scenario: 'default',
    entryFile: 'converge.yml',
    playbooksDir: 'playbooks',
    reportsDir: 'ci/reports',
    timeoutMs: DEFAULT_TIMEOUT_MS,
    driver: 'docker',
    // molecule-docker needs this with Ansible 2.19+
    scenarioEnv: { ANSIBLE_ALLOW_BROKEN_CONDITIONALS: 'true' },
    commands: {
      lint: 'yamllint -c .yamllint.yml {{path}}',
      strictLint: 'ansible-lint {{path}}',
      syntax: 'ansible-playbook --syntax-check {{file}}',
      syntaxAll: "find {{dir}} -name '*.yml' -exec ansible-playbook --syntax-check {} \\;",
      scenario: 'molecule test -s {{scenario}}',
    },
  };
}

/** Layer a user config over the preset; `commands` and `scenarioEnv` merge per key. */
export function mergeConfig(base: PipelineConfig, user: UserConfig | null): PipelineConfig {
  if (!user) {
    return base;
  }
  const { commands, scenarioEnv, ...rest } = user;
  return {
    ...base,
    ...rest,
    commands: { ...base.commands, ...commands },
    scenarioEnv: { ...base.scenarioEnv, ...scenarioEnv },
  };
}
