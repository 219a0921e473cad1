import { ValidationUtils } from '../../src/utils/validation';

/**
 * ValidationUtils 単体テスト
 * パラメータ名、パスセグメント、環境ラベル、変数識別子リストの検証をテスト
 */
describe('ValidationUtils', () => {
  describe('validateParameterName', () => {
    it('正しいパラメータ名を受け入れること', () => {
      expect(ValidationUtils.validateParameterName('/asset-accounting/serviceplatform/staging/REDISCLOUD_URL'))
        .toEqual({ isValid: true, error: '' });
    });

    it('空のパラメータ名を拒否すること', () => {
      expect(ValidationUtils.validateParameterName('  ').error).toBe('Parameter name cannot be empty');
    });

    it('スラッシュで始まらないパラメータ名を拒否すること', () => {
      expect(ValidationUtils.validateParameterName('app/test').error).toBe('Parameter name must start with \'/\'');
    });

    it('無効な文字を含むパラメータ名を拒否すること', () => {
      expect(ValidationUtils.validateParameterName('/app/te st').isValid).toBe(false);
    });

    it('連続するスラッシュを拒否すること', () => {
      expect(ValidationUtils.validateParameterName('/app//test').error)
        .toBe('Parameter name cannot contain consecutive forward slashes (//)');
    });

    it('末尾のスラッシュを拒否すること', () => {
      expect(ValidationUtils.validateParameterName('/app/test/').error)
        .toBe('Parameter name cannot end with a forward slash (/)');
    });

    it('500文字を超えるパラメータ名を拒否すること', () => {
      const name = '/' + 'a'.repeat(500);
      expect(ValidationUtils.validateParameterName(name).error)
        .toBe('Parameter name exceeds maximum length of 500 characters: 501');
    });

    it('15階層を超えるパラメータ名を拒否すること', () => {
      const name = '/a'.repeat(16);
      expect(ValidationUtils.validateParameterName(name).error)
        .toBe('Parameter name exceeds maximum hierarchy depth of 15: 16');
    });
  });

  describe('validatePathSegment', () => {
    it('英数字・アンダースコア・ピリオド・ハイフンを受け入れること', () => {
      expect(ValidationUtils.validatePathSegment('MYSQL_HOST.v-2', 'Variable name').isValid).toBe(true);
    });

    it('スラッシュを含むセグメントを拒否すること', () => {
      expect(ValidationUtils.validatePathSegment('service/platform', 'Subsystem').error)
        .toBe('Subsystem \'service/platform\' contains invalid characters. Only alphanumeric, underscore, period, and hyphen are allowed');
    });

    it('空のセグメントを拒否すること', () => {
      expect(ValidationUtils.validatePathSegment('', 'Namespace').error).toBe('Namespace cannot be empty');
    });
  });

  describe('validateEnvironment', () => {
    it.each(['staging', 'beta', 'production'])('%s を受け入れること', (environment) => {
      expect(ValidationUtils.validateEnvironment(environment).isValid).toBe(true);
    });

    it('未知の環境ラベルを拒否すること', () => {
      expect(ValidationUtils.validateEnvironment('dev').error)
        .toBe('Invalid environment \'dev\'. Must be one of: staging, beta, production');
    });
  });

  describe('isParameterType', () => {
    it('サポートするタイプのみtrueを返すこと', () => {
      expect(ValidationUtils.isParameterType('String')).toBe(true);
      expect(ValidationUtils.isParameterType('SecureString')).toBe(true);
      expect(ValidationUtils.isParameterType('StringList')).toBe(true);
      expect(ValidationUtils.isParameterType('Binary')).toBe(false);
      expect(ValidationUtils.isParameterType(undefined)).toBe(false);
    });
  });

  describe('validateVariables', () => {
    it('空のリストを拒否すること', () => {
      expect(ValidationUtils.validateVariables([])).toEqual({
        isValid: false,
        errors: ['Variable list cannot be empty']
      });
    });

    it('無効な識別子のエラーをまとめて返すこと', () => {
      const result = ValidationUtils.validateVariables(['REDIS_DB', 'BAD NAME', 'a/b']);

      expect(result.isValid).toBe(false);
      expect(result.errors).toHaveLength(2);
      expect(result.errors[0]).toContain('\'BAD NAME\'');
      expect(result.errors[1]).toContain('\'a/b\'');
    });
  });
});
