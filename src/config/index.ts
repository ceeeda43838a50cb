/**
 * 設定管理モジュール
 */

// 設定スキーマとバリデーション
export {
  type EnrollmentConfig,
  type DatabaseConfig,
  type SeedConfig,
  type PaginationConfig,
  type LoggingConfig,
  type LogLevel,
  type Environment,
  type ConfigOverrides,
  EnrollmentConfigSchema,
  DatabaseConfigSchema,
  SeedConfigSchema,
  PaginationConfigSchema,
  LoggingConfigSchema,
  LogLevelSchema,
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './enrollment-config.js';

// デフォルト設定値
export {
  DEFAULT_ENROLLMENT_CONFIG,
  MINIMAL_CONFIG
} from './default-config.js';

// 設定ローダー
export {
  ConfigLoader,
  type ConfigLoadResult,
  loadConfig
} from './config-loader.js';
