import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError } from '@pipeline/core/errors';
import type { UserConfig } from '@pipeline/types';
import ts from 'typescript';

export const CONFIG_CANDIDATES = ['pipeline.config.mjs', 'pipeline.config.js', 'pipeline.config.ts'];

const STRING_KEYS = [
  'unitsDir',
  'markerDir',
  'scenario',
  'entryFile',
  'playbooksDir',
  'reportsDir',
] as const;
const COMMAND_KEYS = ['lint', 'strictLint', 'syntax', 'syntaxAll', 'scenario'] as const;

const isObj = (v: unknown): v is Record<string, unknown> =>
  !!v && typeof v === 'object' && !Array.isArray(v);

function ensureCacheDir(cwd: string) {
  const dir = path.join(cwd, '.cache', 'role-pipeline');
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dir;
}

async function importDefault(modulePath: string): Promise<unknown> {
  const mod: unknown = await import(pathToFileURL(modulePath).href);
  return isObj(mod) && 'default' in mod ? mod.default : mod;
}

function stringRecord(file: string, key: string, value: unknown): Record<string, string> {
  if (!isObj(value)) {
    throw new ConfigError(file, `"${key}" must be an object of strings`);
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== 'string') {
      throw new ConfigError(file, `"${key}.${k}" must be a string`);
    }
    out[k] = v;
  }
  return out;
}

/** Check the exported value and copy the known keys into a `UserConfig`. */
export function parseUserConfig(file: string, raw: unknown): UserConfig {
  if (!isObj(raw)) {
    throw new ConfigError(file, 'expected an object export');
  }
  const config: UserConfig = {};
  for (const key of STRING_KEYS) {
    const v = raw[key];
    if (v === undefined) {
      continue;
    }
    if (typeof v !== 'string' || v.length === 0) {
      throw new ConfigError(file, `"${key}" must be a non-empty string`);
    }
    config[key] = v;
  }
  const { timeoutMs, driver } = raw;
  if (timeoutMs !== undefined) {
    if (typeof timeoutMs !== 'number' || !(timeoutMs > 0)) {
      throw new ConfigError(file, '"timeoutMs" must be a positive number');
    }
    config.timeoutMs = timeoutMs;
  }
  if (driver !== undefined) {
    if (driver !== 'docker' && driver !== 'podman') {
      throw new ConfigError(file, '"driver" must be "docker" or "podman"');
    }
    config.driver = driver;
  }
  if (raw.scenarioEnv !== undefined) {
    config.scenarioEnv = stringRecord(file, 'scenarioEnv', raw.scenarioEnv);
  }
  if (raw.commands !== undefined) {
    const commands = stringRecord(file, 'commands', raw.commands);
    const known: readonly string[] = COMMAND_KEYS;
    const unknown = Object.keys(commands).filter((k) => !known.includes(k));
    if (unknown.length > 0) {
      throw new ConfigError(file, `unknown command template(s): ${unknown.join(', ')}`);
    }
    config.commands = {};
    for (const key of COMMAND_KEYS) {
      const v = commands[key];
      if (v !== undefined) {
        config.commands[key] = v;
      }
    }
  }
  return config;
}

export async function loadUserConfig(cwd: string): Promise<UserConfig | null> {
  for (const f of CONFIG_CANDIDATES) {
    const abs = path.join(cwd, f);
    if (!fs.existsSync(abs)) {
      continue;
    }
    if (!f.endsWith('.ts')) {
      return parseUserConfig(f, await importDefault(abs));
    }
    try {
      // Works when a TypeScript loader such as tsx is active
      return parseUserConfig(f, await importDefault(abs));
    } catch (err: unknown) {
      if (err instanceof ConfigError) {
        throw err;
      }
    }
    const code = fs.readFileSync(abs, 'utf8');
    const out = ts.transpileModule(code, {
      compilerOptions: {
        module: ts.ModuleKind.ESNext,
        target: ts.ScriptTarget.ES2022,
        esModuleInterop: true,
      },
      fileName: abs,
    });
    const outPath = path.join(ensureCacheDir(cwd), 'pipeline.config.mjs');
    fs.writeFileSync(outPath, out.outputText, 'utf8');
    return parseUserConfig(f, await importDefault(outPath));
  }
  return null;
}
