import { z } from 'zod';
import type { ConfigOverrides, EnrollmentConfig } from './enrollment-config.js';
import {
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './enrollment-config.js';
import { DEFAULT_ENROLLMENT_CONFIG } from './default-config.js';

/**
 * 環境変数プレフィックス
 */
const ENV_PREFIX = 'ENROLLMENT_';

type RawConfig = Record<string, unknown>;

const isPlainObject = (value: unknown): value is RawConfig =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 真偽値の環境変数。解釈できない値はそのまま残し、スキーマ検証で弾く
 */
const parseBoolean = (value: string): boolean | string => {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

const setIn = (target: RawConfig, section: string, key: string, value: unknown): void => {
  const existing = target[section];
  const sectionConfig: RawConfig = isPlainObject(existing) ? existing : {};
  sectionConfig[key] = value;
  target[section] = sectionConfig;
};

/**
 * 環境変数から設定を読み込む
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): RawConfig {
  const config: RawConfig = {};
  const read = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  const environment = read('ENVIRONMENT');
  if (environment) {
    config.environment = environment;
  }

  // データベース設定
  const filename = read('DATABASE_FILENAME');
  if (filename) {
    setIn(config, 'database', 'filename', filename);
  }

  // 初期データ設定
  const dataset = read('SEED_DATASET');
  if (dataset) {
    setIn(config, 'seed', 'dataset', dataset);
  }

  const skipIfPresent = read('SEED_SKIP_IF_PRESENT');
  if (skipIfPresent) {
    setIn(config, 'seed', 'skipIfPresent', parseBoolean(skipIfPresent));
  }

  // ログ設定
  const level = read('LOG_LEVEL');
  if (level) {
    setIn(config, 'logging', 'level', level);
  }

  return config;
}

/**
 * 環境別プリセット設定を取得
 */
function getEnvironmentPreset(environment: unknown): ConfigOverrides {
  switch (environment) {
    case 'development':
      return DEVELOPMENT_CONFIG;
    case 'test':
      return TEST_CONFIG;
    case 'production':
      return PRODUCTION_CONFIG;
    default:
      return {};
  }
}

/**
 * 深いマージ（オブジェクトの入れ子をマージ）
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

export type ConfigLoadResult = {
  success: true;
  config: EnrollmentConfig;
} | {
  success: false;
  error: z.ZodError;
  partialConfig?: RawConfig;
};

/**
 * 設定ローダークラス
 */
export class ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * 設定を読み込み・検証
   *
   * 優先順位（後勝ち）:
   * 1. デフォルト設定
   * 2. 環境別プリセット
   * 3. 環境変数
   * 4. オーバーライド
   */
  load(overrides?: ConfigOverrides): ConfigLoadResult {
    try {
      const envConfig = loadFromEnvironment(this.env);
      const environment: unknown =
        overrides?.environment ?? envConfig.environment ?? DEFAULT_ENROLLMENT_CONFIG.environment;

      let config: RawConfig = { ...DEFAULT_ENROLLMENT_CONFIG };
      config = deepMerge(config, getEnvironmentPreset(environment));
      config = deepMerge(config, envConfig);
      if (overrides) {
        config = deepMerge(config, overrides);
      }

      const validationResult = validateConfig(config);
      if (!validationResult.success) {
        return {
          success: false,
          error: validationResult.error,
          partialConfig: config
        };
      }

      return {
        success: true,
        config: validationResult.data
      };
    } catch (error) {
      // 予期しないエラーの場合は ZodError として扱う
      const zodError = new z.ZodError([{
        code: 'custom',
        message: error instanceof Error ? error.message : 'Unknown configuration error',
        path: []
      }]);

      return {
        success: false,
        error: zodError
      };
    }
  }
}

/**
 * プロセスの環境変数から設定を読み込む
 */
export function loadConfig(overrides?: ConfigOverrides): ConfigLoadResult {
  return new ConfigLoader().load(overrides);
}
