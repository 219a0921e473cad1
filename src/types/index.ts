// Parameter Store のパラメータタイプ
export type ParameterType = 'String' | 'SecureString' | 'StringList';

// パラメータ階層（Standardは4KBまで、Advancedは8KBまで）
export type ParameterTier = 'Standard' | 'Advanced' | 'Intelligent-Tiering';

// AWS Parameter Store パラメータの基本定義
export interface Parameter {
  name: string; // パラメータ名（/で始まる階層形式）
  value: string; // パラメータ値（SecureStringは復号化済み）
  type: ParameterType; // パラメータタイプ
  description: string; // パラメータの説明
  kmsKeyId: string; // KMS暗号化キーID（SecureStringで明示指定されている場合のみ）
  tier?: ParameterTier; // 未指定の場合はStandard
}

// DescribeParameters から取得したメタデータ（値は含まない）
export interface ParameterSummary {
  name: string;
  type: ParameterType;
  description: string;
  kmsKeyId: string;
  tier?: ParameterTier;
  lastModifiedDate?: Date; // 最終更新日時
  version?: number; // パラメータバージョン番号
}

/**
 * Parameter Store に対する最小限の操作セット
 * 移行処理はこのインターフェースにのみ依存し、テストではインメモリ実装に差し替える
 */
export interface ParameterStoreClient {
  listAll(): Promise<ParameterSummary[]>;
  getByName(name: string, decrypt: boolean): Promise<Parameter>;
  describeByNameFilter(name: string): Promise<ParameterSummary[]>;
  put(parameter: Parameter, overwrite: boolean): Promise<void>;
}

// 旧パス → 新パスの対応1件
export interface NameMappingEntry {
  variableName: string; // 変数識別子（新旧で共通）
  oldName: string; // /{namespace}/{environment}/{variableName}
  newName: string; // /{namespace}/{subsystem}/{environment}/{variableName}
}

// 順序付きの名前対応表（実行ごとに再生成される）
export type NameMapping = ReadonlyArray<NameMappingEntry>;

// 名前対応表の生成オプション
export interface NameMappingOptions {
  namespace: string; // 先頭のパスセグメント
  subsystem: string; // 新階層で環境の前に挿入されるセグメント
}

// 対象環境ラベル
export type Environment = 'staging' | 'beta' | 'production';

// 移行処理の設定
export interface MigrationConfig extends NameMappingOptions {
  environment: Environment;
  profile: string; // AWS プロファイル名
  region?: string; // AWS リージョン
  variables: string[]; // 移行対象の変数識別子（順序を保持）
  overwrite: boolean; // 既存の移行先パラメータを上書きするか
}

// コピー済みパラメータの記録
export interface CopiedParameter {
  variableName: string;
  oldName: string;
  newName: string;
  type: ParameterType;
}

// 移行処理の実行結果
export interface MigrationResult {
  copied: CopiedParameter[];
}

// AWS設定オプション
export interface AWSConfigOptions {
  region?: string; // AWS リージョン
  profile?: string; // AWS プロファイル名
}

// AWS認証コンテキスト情報
export interface AWSContext {
  account: string; // AWSアカウントID
  region: string; // AWS リージョン
  arn: string; // ユーザーARN
  profile?: string; // プロファイル名
}

// バリデーション結果
export interface ValidationResult {
  isValid: boolean; // バリデーション成功フラグ
  error: string; // エラーメッセージ
}
