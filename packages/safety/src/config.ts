/**
 * Configuration Loader
 *
 * Built-in defaults, overlaid by an optional YAML file and then by
 * environment variables. The result is frozen and passed to the gate.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, deepFreeze, errorMessage, splitList, validate } from '@hook-gate/common';
import { DEFAULT_LINTERS, type LinterSpec, type LinterTable } from './checkers/lint.js';
import { DEFAULT_MAX_WORKERS } from './dispatcher.js';
import { DEFAULT_GIT_TIMEOUT_MS } from './git.js';
import { isValidPattern } from './rules.js';
import type { Rule } from './types.js';

export const CONFIG_FILE_NAME = '.hook-gate.yaml';

export interface ExtraRules {
  dangerousCommands: readonly Rule[];
  protectedPaths: readonly Rule[];
  secrets: readonly Rule[];
  protectedBranches: readonly Rule[];
}

export interface GateConfig {
  logDir: string;
  backupDir: string;
  disabledHooks: readonly string[];
  maxWorkers: number;
  lintTimeoutMs: number;
  gitTimeoutMs: number;
  notifyTimeoutMs: number;
  extraRules: ExtraRules;
  linters: LinterTable;
}

export interface LoadedConfig {
  config: Readonly<GateConfig>;
  /** Path of the config file that was applied, if any */
  source?: string;
  warnings: string[];
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

// ============================================================================
// Schema
// ============================================================================

const ruleSchema = z.object({
  pattern: z.string().min(1).refine(isValidPattern, 'Invalid regular expression'),
  label: z.string().min(1),
});

const linterSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export const configFileSchema = z.object({
  logDir: z.string().min(1).optional(),
  backupDir: z.string().min(1).optional(),
  disabledHooks: z.array(z.string()).optional(),
  maxWorkers: z.number().int().min(1).max(16).optional(),
  lintTimeoutMs: z.number().int().min(100).optional(),
  gitTimeoutMs: z.number().int().min(100).optional(),
  notifyTimeoutMs: z.number().int().min(100).optional(),
  extraRules: z.object({
    dangerousCommands: z.array(ruleSchema).optional(),
    protectedPaths: z.array(ruleSchema).optional(),
    secrets: z.array(ruleSchema).optional(),
    protectedBranches: z.array(ruleSchema).optional(),
  }).strict().optional(),
  // `null` switches a default linter off
  linters: z.record(
    z.string().regex(/^\.[A-Za-z0-9]+$/, 'Linter keys are extensions like ".py"'),
    linterSchema.nullable()
  ).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Loading
// ============================================================================

export function defaultConfig(homeDir: string = os.homedir()): GateConfig {
  const baseDir = path.join(homeDir, '.hook-gate');
  return {
    logDir: path.join(baseDir, 'logs'),
    backupDir: path.join(baseDir, 'backups'),
    disabledHooks: [],
    maxWorkers: DEFAULT_MAX_WORKERS,
    lintTimeoutMs: 30_000,
    gitTimeoutMs: DEFAULT_GIT_TIMEOUT_MS,
    notifyTimeoutMs: 5_000,
    extraRules: {
      dangerousCommands: [],
      protectedPaths: [],
      secrets: [],
      protectedBranches: [],
    },
    linters: DEFAULT_LINTERS,
  };
}

/**
 * Read and validate a YAML config file
 */
export function readConfigFile(configPath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(error)}`, { configPath });
  }

  // An empty file parses to null
  const result = validate(configFileSchema, raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${result.error}`, { configPath });
  }
  return result.data;
}

function mergeLinters(base: LinterTable, overrides: ConfigFile['linters']): LinterTable {
  if (!overrides) return base;

  const merged: Record<string, LinterSpec> = { ...base };
  for (const [ext, spec] of Object.entries(overrides)) {
    const key = ext.toLowerCase();
    if (spec === null) {
      delete merged[key];
    } else {
      merged[key] = spec;
    }
  }
  return merged;
}

export function applyConfigFile(base: GateConfig, file: ConfigFile, baseDir: string): GateConfig {
  const extra = file.extraRules ?? {};
  return {
    logDir: file.logDir ? path.resolve(baseDir, file.logDir) : base.logDir,
    backupDir: file.backupDir ? path.resolve(baseDir, file.backupDir) : base.backupDir,
    disabledHooks: file.disabledHooks ?? base.disabledHooks,
    maxWorkers: file.maxWorkers ?? base.maxWorkers,
    lintTimeoutMs: file.lintTimeoutMs ?? base.lintTimeoutMs,
    gitTimeoutMs: file.gitTimeoutMs ?? base.gitTimeoutMs,
    notifyTimeoutMs: file.notifyTimeoutMs ?? base.notifyTimeoutMs,
    extraRules: {
      dangerousCommands: [...base.extraRules.dangerousCommands, ...(extra.dangerousCommands ?? [])],
      protectedPaths: [...base.extraRules.protectedPaths, ...(extra.protectedPaths ?? [])],
      secrets: [...base.extraRules.secrets, ...(extra.secrets ?? [])],
      protectedBranches: [...base.extraRules.protectedBranches, ...(extra.protectedBranches ?? [])],
    },
    linters: mergeLinters(base.linters, file.linters),
  };
}

export function applyEnv(base: GateConfig, env: NodeJS.ProcessEnv): GateConfig {
  return {
    ...base,
    logDir: env.HOOK_GATE_LOG_DIR || base.logDir,
    backupDir: env.HOOK_GATE_BACKUP_DIR || base.backupDir,
    disabledHooks: [...base.disabledHooks, ...splitList(env.HOOK_GATE_DISABLE)],
  };
}

/**
 * Build the configuration for this process. A broken config file is
 * reported as a warning and skipped; loading never throws.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const warnings: string[] = [];

  let config = defaultConfig(options.homeDir);
  let source: string | undefined;

  const explicitPath = env.HOOK_GATE_CONFIG;
  const configPath = explicitPath
    ? path.resolve(cwd, explicitPath)
    : path.join(cwd, CONFIG_FILE_NAME);

  if (explicitPath || fs.existsSync(configPath)) {
    try {
      config = applyConfigFile(config, readConfigFile(configPath), path.dirname(configPath));
      source = configPath;
    } catch (error) {
      warnings.push(`${errorMessage(error)}; using defaults`);
    }
  }

  config = applyEnv(config, env);

  return {
    config: deepFreeze(config),
    ...(source && { source }),
    warnings,
  };
}
