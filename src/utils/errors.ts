/**
 * 移行処理のエラー分類
 * どのエラーも捕捉されずにCLIのトップレベルまで伝播し、プロセスを終了させる
 */

// 原因となったエラーからメッセージを取り出す
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : 'Unknown error';
}

export class MigrationError extends Error {
  public readonly operation: string; // 失敗した操作名
  public readonly parameterName?: string; // 対象パラメータ名

  constructor(operation: string, parameterName: string | undefined, cause: unknown) {
    const target = parameterName ? ` for ${parameterName}` : '';
    super(`${operation} failed${target}: ${describeCause(cause)}`, { cause });
    this.name = new.target.name;
    this.operation = operation;
    this.parameterName = parameterName;
  }
}

// 設定・認証情報の解決に失敗（パラメータ処理開始前に中断）
export class ConfigLoadError extends MigrationError {
  constructor(cause: unknown) {
    super('Load configuration', undefined, cause);
  }
}

export class SourceNotFoundError extends MigrationError {
  constructor(parameterName: string, cause: unknown = 'parameter not found') {
    super('Get source parameter', parameterName, cause);
  }
}

export class SourceFetchError extends MigrationError {
  constructor(parameterName: string, cause: unknown) {
    super('Get source parameter', parameterName, cause);
  }
}

export class DescriptionNotFoundError extends MigrationError {
  constructor(parameterName: string) {
    super('Get source parameter description', parameterName, 'parameter not found');
  }
}

export class DescriptionFetchError extends MigrationError {
  constructor(parameterName: string, cause: unknown) {
    super('Get source parameter description', parameterName, cause);
  }
}

export class DestinationWriteError extends MigrationError {
  constructor(parameterName: string, cause: unknown) {
    super('Put destination parameter', parameterName, cause);
  }
}

// Parameter Store 側で対象パラメータが存在しない
export class ParameterNotFoundError extends Error {
  public readonly parameterName: string;

  constructor(parameterName: string) {
    super(`Parameter not found: ${parameterName}`);
    this.name = 'ParameterNotFoundError';
    this.parameterName = parameterName;
  }
}
