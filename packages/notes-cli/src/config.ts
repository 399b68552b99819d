import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export interface NotekeeperConfig {
  notesDir: string;
  /** Where `notesDir` came from: `--dir`, the environment, or a config file. */
  source: 'option' | 'env' | 'file';
  configPath?: string;
}

export const NOTES_DIR_ENV_VAR = 'NOTEKEEPER_DIR';

const DEFAULT_CONFIG_FILENAMES = [
  'notekeeper.config.json',
  'notekeeper.config.yaml',
  'notekeeper.config.yml',
];

const ConfigFileSchema = z.object({
  notesDir: z.string().trim().min(1),
});

export function loadConfig(
  options: { dir?: string; cwd?: string; env?: NodeJS.ProcessEnv } = {},
): NotekeeperConfig | undefined {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const optionDir = options.dir?.trim();
  if (optionDir) {
    return { notesDir: resolveDir(optionDir, cwd), source: 'option' };
  }

  const envDir = env[NOTES_DIR_ENV_VAR]?.trim();
  if (envDir) {
    return { notesDir: resolveDir(envDir, cwd), source: 'env' };
  }

  const configPath = findConfigFile(cwd);
  if (!configPath) return undefined;

  const content = fs.readFileSync(configPath, 'utf8');
  let raw: unknown;
  try {
    raw = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not parse ${configPath}: ${message}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Config file must include notesDir: ${configPath}`);
  }

  return {
    notesDir: resolveDir(parsed.data.notesDir, path.dirname(configPath)),
    source: 'file',
    configPath,
  };
}

function resolveDir(dir: string, base: string): string {
  if (dir === '~') {
    return os.homedir();
  }
  if (dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return path.resolve(base, dir);
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}
