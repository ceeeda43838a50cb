import { z } from 'zod';

/**
 * 履修CLI設定定義
 */

// === データベース設定 ===
export const DatabaseConfigSchema = z.object({
  /** better-sqlite3 に渡すファイル名。`:memory:` でインメモリ */
  filename: z.string().min(1).default(':memory:')
});

// === 初期データ設定 ===
export const SeedConfigSchema = z.object({
  /** full: 学生10名 / compact: 学生4名 */
  dataset: z.enum(['full', 'compact']).default('full'),

  /** 既に行があるテーブルへの投入をスキップする */
  skipIfPresent: z.boolean().default(true)
});

// === ページング設定 ===
export const PaginationConfigSchema = z.object({
  minPageSize: z.number().int().min(1).default(1),
  maxPageSize: z.number().int().min(1).max(100).default(5)
}).refine(
  (pagination) => pagination.minPageSize <= pagination.maxPageSize,
  { message: 'minPageSize must not exceed maxPageSize' }
);

// === ログ設定 ===
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn')
});

// === 統合設定スキーマ ===
export const EnrollmentConfigSchema = z.object({
  /** 設定環境 */
  environment: z.enum(['development', 'test', 'production']).default('development'),

  database: DatabaseConfigSchema.default({}),
  seed: SeedConfigSchema.default({}),
  pagination: PaginationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({})
});

// === 型定義 ===
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type SeedConfig = z.infer<typeof SeedConfigSchema>;
export type PaginationConfig = z.infer<typeof PaginationConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type EnrollmentConfig = z.infer<typeof EnrollmentConfigSchema>;
export type Environment = EnrollmentConfig['environment'];

/**
 * セクション単位で部分指定できる設定（環境別プリセット・上書き用）
 */
export type ConfigOverrides = {
  [K in keyof EnrollmentConfig]?: EnrollmentConfig[K] extends object
    ? Partial<EnrollmentConfig[K]>
    : EnrollmentConfig[K];
};

// === 設定検証ヘルパー ===
export function validateConfig(input: unknown): {
  success: true;
  data: EnrollmentConfig;
} | {
  success: false;
  error: z.ZodError;
} {
  const result = EnrollmentConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  } else {
    return { success: false, error: result.error };
  }
}

// === 環境別設定プリセット ===
export const DEVELOPMENT_CONFIG: ConfigOverrides = {
  environment: 'development',
  logging: { level: 'info' }
};

export const TEST_CONFIG: ConfigOverrides = {
  environment: 'test',
  database: { filename: ':memory:' },
  logging: { level: 'warn' }
};

export const PRODUCTION_CONFIG: ConfigOverrides = {
  environment: 'production',
  logging: { level: 'warn' }
};
