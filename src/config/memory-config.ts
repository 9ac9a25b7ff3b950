/**
 * Hybrid Memory Configuration
 *
 * 配置层级（优先级从低到高）：
 * 1. 默认配置
 * 2. 项目配置: <project>/.hybrid-memory/config.json
 * 3. 环境变量 (HM_*)
 * 4. 显式覆盖
 *
 * 合并结果经 zod 校验后冻结。
 *
 * @module MemoryConfig
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Schema
// ============================================================================

const filtersSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.array(z.string()), z.null()])
);

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const memoryConfigSchema = z.object({
  kEpi: z.number().int().min(0),
  kSem: z.number().int().min(0),
  tokenBudget: z.number().int().min(0),
  rerankerEnabled: z.boolean(),
  episodic: z.object({
    capacity: z.number().int().positive(),
    defaultTtlDays: z.number().min(0).nullable(),
    /** 按事件类别覆盖 TTL；null 表示永不过期 */
    ttlDays: z.record(z.string(), z.number().min(0).nullable()),
  }),
  episodicFilters: filtersSchema.nullable(),
  semanticFilters: filtersSchema.nullable(),
  piiScrubAtIngest: z.boolean(),
  tracing: z.object({
    enabled: z.boolean(),
    /** JSONL 路径；null 表示只保留在内存 */
    path: z.string().min(1).nullable(),
  }),
  logging: z.object({
    level: logLevelSchema,
  }),
});

export type MemoryConfig = z.infer<typeof memoryConfigSchema>;

const overridesSchema = memoryConfigSchema
  .extend({
    episodic: memoryConfigSchema.shape.episodic.partial(),
    tracing: memoryConfigSchema.shape.tracing.partial(),
    logging: memoryConfigSchema.shape.logging.partial(),
  })
  .partial();

export type MemoryConfigOverrides = z.infer<typeof overridesSchema>;

export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
  kEpi: 4,
  kSem: 3,
  tokenBudget: 1600,
  rerankerEnabled: false,
  episodic: {
    capacity: 2000,
    defaultTtlDays: 30,
    ttlDays: {},
  },
  episodicFilters: null,
  semanticFilters: { tags: ['policy'], pii: false },
  piiScrubAtIngest: false,
  tracing: {
    enabled: true,
    path: 'out/traces.jsonl',
  },
  logging: {
    level: 'info',
  },
};

export const CONFIG_DIR_NAME = '.hybrid-memory';

// ============================================================================
// Environment
// ============================================================================

type Env = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function readInt(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw || !/^-?\d+$/.test(raw)) return undefined;
  return Number.parseInt(raw, 10);
}

function readBool(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return undefined;
  return TRUE_VALUES.has(raw.toLowerCase());
}

function readFilters(env: Env, name: string): MemoryConfig['semanticFilters'] | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    // 非法 JSON 回退到低层配置
    return undefined;
  }
  const parsed = filtersSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * 从环境变量读取配置覆盖项
 *
 * 解析宽松：无法识别的值被忽略，由低层配置生效。
 */
export function configFromEnvironment(env: Env = process.env): MemoryConfigOverrides {
  const config: MemoryConfigOverrides = {};

  const kEpi = readInt(env, 'HM_K_EPI');
  if (kEpi !== undefined) config.kEpi = kEpi;

  const kSem = readInt(env, 'HM_K_SEM');
  if (kSem !== undefined) config.kSem = kSem;

  const tokenBudget = readInt(env, 'HM_TOKEN_BUDGET');
  if (tokenBudget !== undefined) config.tokenBudget = tokenBudget;

  const rerankerEnabled = readBool(env, 'HM_RERANKER_ENABLED');
  if (rerankerEnabled !== undefined) config.rerankerEnabled = rerankerEnabled;

  const piiScrub = readBool(env, 'HM_PII_SCRUB');
  if (piiScrub !== undefined) config.piiScrubAtIngest = piiScrub;

  const episodic: NonNullable<MemoryConfigOverrides['episodic']> = {};
  const ttlDays = readInt(env, 'HM_EPISODIC_TTL_DAYS');
  if (ttlDays !== undefined) episodic.defaultTtlDays = ttlDays;
  const capacity = readInt(env, 'HM_EPISODIC_CAPACITY');
  if (capacity !== undefined) episodic.capacity = capacity;
  if (Object.keys(episodic).length > 0) config.episodic = episodic;

  const episodicFilters = readFilters(env, 'HM_EPI_FILTERS_JSON');
  if (episodicFilters !== undefined) config.episodicFilters = episodicFilters;

  const semanticFilters = readFilters(env, 'HM_SEM_FILTERS_JSON');
  if (semanticFilters !== undefined) config.semanticFilters = semanticFilters;

  const tracePath = env.HM_TRACE_PATH;
  if (tracePath !== undefined) {
    // 空字符串关闭文件输出
    config.tracing = { path: tracePath.trim() === '' ? null : tracePath.trim() };
  }

  const level = logLevelSchema.safeParse(env.HM_LOG_LEVEL?.trim().toLowerCase());
  if (level.success) config.logging = { level: level.data };

  return config;
}

// ============================================================================
// Merge & validation
// ============================================================================

function withoutUndefined<T extends object>(value: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) return result;
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

export function mergeConfig(base: MemoryConfig, override: MemoryConfigOverrides): MemoryConfig {
  const top = withoutUndefined(override);
  return {
    ...base,
    ...top,
    episodic: { ...base.episodic, ...withoutUndefined(override.episodic) },
    tracing: { ...base.tracing, ...withoutUndefined(override.tracing) },
    logging: { ...base.logging, ...withoutUndefined(override.logging) },
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

function freezeConfig(config: MemoryConfig): MemoryConfig {
  Object.freeze(config.episodic.ttlDays);
  Object.freeze(config.episodic);
  Object.freeze(config.tracing);
  Object.freeze(config.logging);
  if (config.episodicFilters) Object.freeze(config.episodicFilters);
  if (config.semanticFilters) Object.freeze(config.semanticFilters);
  return Object.freeze(config);
}

/**
 * 校验完整配置，失败时抛出 ConfigError
 */
export function validateConfig(candidate: unknown): MemoryConfig {
  const parsed = memoryConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`, {
      field: first?.path.join('.'),
      details: parsed.error.issues,
    });
  }
  return freezeConfig(parsed.data);
}

// ============================================================================
// Manager
// ============================================================================

export interface MemoryConfigManagerOptions {
  /** 项目目录，默认当前工作目录 */
  projectDir?: string;
  configFileName?: string;
  /** 环境变量来源，默认 process.env */
  env?: Env;
  logger?: Logger;
}

export class MemoryConfigManager {
  private config: MemoryConfig = validateConfig(DEFAULT_MEMORY_CONFIG);
  private projectDir: string;
  private configFileName: string;
  private env: Env;
  private logger: Logger;

  constructor(options: MemoryConfigManagerOptions = {}) {
    this.projectDir = options.projectDir ?? process.cwd();
    this.configFileName = options.configFileName ?? 'config.json';
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? getLogger('config');
  }

  get projectConfigPath(): string {
    return path.join(this.projectDir, CONFIG_DIR_NAME, this.configFileName);
  }

  /**
   * 加载配置
   */
  async load(overrides: MemoryConfigOverrides = {}): Promise<MemoryConfig> {
    let config = DEFAULT_MEMORY_CONFIG;

    const projectConfig = await this.loadProjectConfig();
    config = mergeConfig(config, projectConfig);

    config = mergeConfig(config, configFromEnvironment(this.env));
    config = mergeConfig(config, overrides);

    this.config = validateConfig(config);
    this.logger.debug('Configuration loaded', {
      kEpi: this.config.kEpi,
      kSem: this.config.kSem,
      tokenBudget: this.config.tokenBudget,
      tracePath: this.config.tracing.path,
    });
    return this.config;
  }

  /**
   * 获取当前配置
   */
  getConfig(): MemoryConfig {
    return this.config;
  }

  private async loadProjectConfig(): Promise<MemoryConfigOverrides> {
    const configPath = this.projectConfigPath;

    let content: string;
    try {
      content = await fs.promises.readFile(configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new ConfigError(`Cannot read configuration file ${configPath}`, {
        details: { path: configPath },
        cause: error instanceof Error ? error : undefined,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Configuration file ${configPath} is not valid JSON`, {
        details: { path: configPath },
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = overridesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration file ${configPath}: ${describeIssues(parsed.error)}`, {
        field: parsed.error.issues[0]?.path.join('.'),
        details: parsed.error.issues,
      });
    }

    this.logger.debug('Project configuration read', { path: configPath });
    return parsed.data;
  }
}
