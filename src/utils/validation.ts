import { Environment, ParameterType, ValidationResult } from '../types';
import { ENVIRONMENTS, PARAMETER_TYPES, SECURITY, VALIDATION_LIMITS } from '../config/constants';

/**
 * 移行設定とパラメータ名のバリデーションを担当するユーティリティクラス
 * AWS Parameter Storeの命名規則に基づいた検証を実行
 */
export class ValidationUtils {
  // パラメータ名の安全性を検証する
  public static validateParameterName(name: string): ValidationResult {
    const trimmedName = name.trim();

    if (trimmedName === '') {
      return { isValid: false, error: 'Parameter name cannot be empty' };
    }

    if (!trimmedName.startsWith('/')) {
      return { isValid: false, error: 'Parameter name must start with \'/\'' };
    }

    if (!SECURITY.PARAMETER_NAME_PATTERN.test(trimmedName)) {
      return {
        isValid: false,
        error: 'Parameter name contains invalid characters. Only alphanumeric, underscore, period, hyphen, and forward slash are allowed'
      };
    }

    // 連続するスラッシュの検証
    if (trimmedName.includes('//')) {
      return {
        isValid: false,
        error: 'Parameter name cannot contain consecutive forward slashes (//)'
      };
    }

    if (trimmedName.length > 1 && trimmedName.endsWith('/')) {
      return {
        isValid: false,
        error: 'Parameter name cannot end with a forward slash (/)'
      };
    }

    if (trimmedName.length > VALIDATION_LIMITS.PARAMETER_NAME_MAX_LENGTH) {
      return {
        isValid: false,
        error: `Parameter name exceeds maximum length of ${VALIDATION_LIMITS.PARAMETER_NAME_MAX_LENGTH} characters: ${trimmedName.length}`
      };
    }

    // 階層の深さ（先頭スラッシュ以降のセグメント数）
    const depth = trimmedName.split('/').length - 1;
    if (depth > VALIDATION_LIMITS.PARAMETER_HIERARCHY_MAX_DEPTH) {
      return {
        isValid: false,
        error: `Parameter name exceeds maximum hierarchy depth of ${VALIDATION_LIMITS.PARAMETER_HIERARCHY_MAX_DEPTH}: ${depth}`
      };
    }

    return { isValid: true, error: '' };
  }

  /**
   * パス1セグメント分（namespace、subsystem、変数識別子）を検証する
   * スラッシュを含むと新旧パスの対応が崩れるため許可しない
   */
  public static validatePathSegment(segment: string, label: string): ValidationResult {
    if (segment.trim() === '') {
      return { isValid: false, error: `${label} cannot be empty` };
    }

    if (!SECURITY.PATH_SEGMENT_PATTERN.test(segment)) {
      return {
        isValid: false,
        error: `${label} '${segment}' contains invalid characters. Only alphanumeric, underscore, period, and hyphen are allowed`
      };
    }

    return { isValid: true, error: '' };
  }

  // 環境ラベルの検証
  public static validateEnvironment(environment: string): ValidationResult {
    if (!this.isEnvironment(environment)) {
      return {
        isValid: false,
        error: `Invalid environment '${environment}'. Must be one of: ${ENVIRONMENTS.join(', ')}`
      };
    }
    return { isValid: true, error: '' };
  }

  public static isEnvironment(value: string): value is Environment {
    return ENVIRONMENTS.some(environment => environment === value);
  }

  public static isParameterType(value: string | undefined): value is ParameterType {
    return value === PARAMETER_TYPES.STRING ||
      value === PARAMETER_TYPES.SECURE_STRING ||
      value === PARAMETER_TYPES.STRING_LIST;
  }

  /**
   * 変数識別子リストを検証する
   * 空リストと各識別子の形式をチェックし、全エラーをまとめて返す
   */
  public static validateVariables(variables: readonly string[]): { isValid: boolean; errors: string[] } {
    if (variables.length === 0) {
      return { isValid: false, errors: ['Variable list cannot be empty'] };
    }

    const errors = variables
      .map(variable => this.validatePathSegment(variable, 'Variable name'))
      .filter(result => !result.isValid)
      .map(result => result.error);

    return { isValid: errors.length === 0, errors };
  }
}
