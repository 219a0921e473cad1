import * as fs from 'fs';
import { Environment, MigrationConfig } from '../types';
import { ValidationUtils } from '../utils/validation';
import { ConfigLoadError, describeCause } from '../utils/errors';
import { NameMapper } from '../services/name-mapper.service';
import { ENVIRONMENT_PROFILES, MIGRATION_DEFAULTS } from './constants';

// CLIから受け取る生の移行オプション
export interface MigrationCliOptions {
  environment: string;
  profile?: string;
  region?: string;
  namespace: string;
  subsystem: string;
  variable?: string[];
  variablesFile?: string;
  overwrite: boolean;
}

// production のみ本番用プロファイル、それ以外は staging 用プロファイル
export function resolveProfile(environment: Environment): string {
  return environment === 'production' ? ENVIRONMENT_PROFILES.production : ENVIRONMENT_PROFILES.default;
}

/**
 * 変数識別子リストをJSONファイルから読み込む
 * ファイルの中身は文字列の配列であること
 */
export function loadVariablesFile(filePath: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigLoadError(`Failed to read variables file ${filePath}: ${describeCause(error)}`);
  }

  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
    throw new ConfigLoadError(`Variables file ${filePath} must contain a JSON array of strings`);
  }

  return parsed;
}

/**
 * CLIオプションから移行設定を組み立てる
 * 変数リストの優先順位: --variable > --variables-file > デフォルトファイル
 */
export function resolveMigrationConfig(options: MigrationCliOptions): MigrationConfig {
  const environment = options.environment;
  if (!ValidationUtils.isEnvironment(environment)) {
    throw new ConfigLoadError(ValidationUtils.validateEnvironment(environment).error);
  }

  const errors: string[] = [];
  const namespaceValidation = ValidationUtils.validatePathSegment(options.namespace, 'Namespace');
  if (!namespaceValidation.isValid) {
    errors.push(namespaceValidation.error);
  }
  const subsystemValidation = ValidationUtils.validatePathSegment(options.subsystem, 'Subsystem');
  if (!subsystemValidation.isValid) {
    errors.push(subsystemValidation.error);
  }

  // ファイル読み込みの失敗も他の設定エラーとまとめて報告する
  let variables: string[] = [];
  if (options.variable && options.variable.length > 0) {
    variables = options.variable;
    errors.push(...ValidationUtils.validateVariables(variables).errors);
  } else {
    try {
      variables = loadVariablesFile(options.variablesFile ?? MIGRATION_DEFAULTS.VARIABLES_FILE);
      errors.push(...ValidationUtils.validateVariables(variables).errors);
    } catch (error) {
      errors.push(error instanceof ConfigLoadError ? describeCause(error.cause) : describeCause(error));
    }
  }

  if (errors.length > 0) {
    throw new ConfigLoadError(errors.join('; '));
  }

  // 新階層のパス（旧階層より長い）がParameter Storeの制限に収まるか確認
  for (const variableName of variables) {
    const newName = NameMapper.buildNewName(options.namespace, options.subsystem, environment, variableName);
    const nameValidation = ValidationUtils.validateParameterName(newName);
    if (!nameValidation.isValid) {
      throw new ConfigLoadError(`${newName}: ${nameValidation.error}`);
    }
  }

  return {
    environment,
    profile: options.profile ?? resolveProfile(environment),
    region: options.region,
    namespace: options.namespace,
    subsystem: options.subsystem,
    variables,
    overwrite: options.overwrite
  };
}
