import type { EnrollmentConfig } from './enrollment-config.js';

/**
 * デフォルト設定値
 */
export const DEFAULT_ENROLLMENT_CONFIG: EnrollmentConfig = {
  environment: 'development',

  database: {
    filename: ':memory:'
  },

  seed: {
    dataset: 'full',
    skipIfPresent: true
  },

  pagination: {
    minPageSize: 1,
    maxPageSize: 5
  },

  logging: {
    level: 'warn'
  }
};

/**
 * 最小限の設定（テスト用）
 */
export const MINIMAL_CONFIG: EnrollmentConfig = {
  environment: 'test',

  database: {
    filename: ':memory:'
  },

  seed: {
    dataset: 'compact',
    skipIfPresent: true
  },

  pagination: {
    minPageSize: 1,
    maxPageSize: 5
  },

  logging: {
    level: 'silent'
  }
};
