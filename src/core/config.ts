import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { defaultTables } from './data/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { DetectorTables, MojiscanConfig } from './types.js';

export const CONFIG_FILE = '.mojiscanrc.json';
export const CONFIG_ENV = 'MOJISCAN_CONFIG';

const configFileSchema = z.object({
  replaceDefaults: z.boolean().default(false),
  patterns: z.array(z.object({ corrupted: z.string(), correct: z.string() }).strict()).default([]),
  rules: z.array(z.object({
    pattern: z.string(),
    description: z.string(),
    flags: z.string().optional(),
  }).strict()).default([]),
  suspiciousCombos: z.array(z.string()).default([]),
  weirdChars: z.array(z.string()).default([]),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface ResolveOptions {
  projectRoot?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfig(options: ResolveOptions = {}): MojiscanConfig {
  const root = options.projectRoot ? resolve(options.projectRoot) : process.cwd();
  const env = options.env ?? process.env;

  // Explicit path, then env, then the project default (optional)
  const explicit = options.configPath ?? env[CONFIG_ENV];
  const configPath = explicit ? resolve(root, explicit) : join(root, CONFIG_FILE);

  if (!explicit && !existsSync(configPath)) {
    return { projectRoot: root, tables: defaultTables() };
  }

  const file = loadConfigFile(configPath);
  return {
    projectRoot: root,
    configPath,
    tables: mergeTables(defaultTables(), file),
  };
}

export function loadConfigFile(configPath: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON: ${errorMessage(err)}`);
  }

  return parseConfigFile(json, configPath);
}

export function parseConfigFile(json: unknown, origin = 'config'): ConfigFile {
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${origin}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function mergeTables(defaults: DetectorTables, file: ConfigFile): DetectorTables {
  if (file.replaceDefaults) {
    return {
      patterns: file.patterns,
      rules: file.rules,
      profile: { suspiciousCombos: file.suspiciousCombos, weirdChars: file.weirdChars },
    };
  }

  return {
    patterns: [...defaults.patterns, ...file.patterns],
    rules: [...defaults.rules, ...file.rules],
    profile: {
      suspiciousCombos: [...defaults.profile.suspiciousCombos, ...file.suspiciousCombos],
      weirdChars: [...defaults.profile.weirdChars, ...file.weirdChars],
    },
  };
}
