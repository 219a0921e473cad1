import * as path from 'path';

/**
 * アプリケーション定数と設定値
 */

// AWS Parameter Store制限値定数
export const VALIDATION_LIMITS = {
  PARAMETER_NAME_MAX_LENGTH: 500, // パラメータ名の最大長（AWS Parameter Store制限）
  PARAMETER_HIERARCHY_MAX_DEPTH: 15 // パラメータ階層の最大深度
} as const;

// パラメータタイプ定数
export const PARAMETER_TYPES = {
  STRING: 'String',
  SECURE_STRING: 'SecureString',
  STRING_LIST: 'StringList'
} as const;

// 対象環境ラベル
export const ENVIRONMENTS = ['staging', 'beta', 'production'] as const;

/**
 * 移行処理のデフォルト値
 * 旧階層: /{namespace}/{environment}/{variable}
 * 新階層: /{namespace}/{subsystem}/{environment}/{variable}
 */
export const MIGRATION_DEFAULTS = {
  ENVIRONMENT: 'staging',
  NAMESPACE: 'asset-accounting',
  SUBSYSTEM: 'serviceplatform',
  // 変数識別子リストのJSONファイル（src/config と dist/config のどちらからも同じ位置）
  VARIABLES_FILE: path.resolve(__dirname, '../../config/variables.json')
} as const;

// 環境ごとのAWSプロファイル（production 以外は staging のプロファイルを使う）
export const ENVIRONMENT_PROFILES = {
  production: 'aa_prod',
  default: 'aa_stg'
} as const;

export const SECURITY = {
  PARAMETER_NAME_PATTERN: /^[a-zA-Z0-9_./-]*$/, // パラメータ名で許可される文字（AWS Parameter Store要件）
  PATH_SEGMENT_PATTERN: /^[a-zA-Z0-9_.-]+$/ // 1セグメント（スラッシュを含まない）
} as const;

// AWS API制限値定数
export const AWS_LIMITS = {
  DESCRIBE_PARAMETERS_MAX_RESULTS: 50 // DescribeParameters のページあたり最大結果数
} as const;
