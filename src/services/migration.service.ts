import { CopiedParameter, MigrationResult, NameMapping, Parameter, ParameterStoreClient, ParameterSummary } from '../types';
import { Logger } from '../utils/logger';
import {
  DescriptionFetchError,
  DescriptionNotFoundError,
  DestinationWriteError,
  ParameterNotFoundError,
  SourceFetchError,
  SourceNotFoundError
} from '../utils/errors';
import { PARAMETER_TYPES } from '../config/constants';

export interface MigrationServiceOptions {
  overwrite: boolean; // 移行先に同名パラメータがある場合に上書きするか
}

/**
 * 旧階層のパラメータを新階層へコピーするサービスクラス
 * 1件ずつ「取得 → 説明取得 → 書き込み」を完了させてから次へ進み、
 * 最初の失敗で残りを処理せずに中断する
 */
export class MigrationService {
  constructor(
    private readonly store: ParameterStoreClient,
    private readonly options: MigrationServiceOptions
  ) {}

  public async migrate(mapping: NameMapping): Promise<MigrationResult> {
    Logger.header(`Parameter Migration (${mapping.length} parameters)`);
    if (this.options.overwrite) {
      Logger.warning('Overwrite enabled - existing destination parameters will be replaced');
    }

    const copied: CopiedParameter[] = [];

    for (const [index, entry] of mapping.entries()) {
      Logger.info(`[${index + 1}/${mapping.length}] oldName: ${entry.oldName} == newName: ${entry.newName}`);

      try {
        const parameter = await this.copyParameter(entry.oldName, entry.newName);
        copied.push({
          variableName: entry.variableName,
          oldName: entry.oldName,
          newName: entry.newName,
          type: parameter.type
        });
      } catch (error) {
        Logger.error(`Migration aborted at ${entry.variableName} (${index + 1}/${mapping.length}), ${mapping.length - index - 1} remaining parameters not processed`);
        throw error;
      }
    }

    Logger.summary({ copied: copied.length, total: mapping.length });
    return { copied };
  }

  /**
   * 1件のパラメータをコピーする
   * 値とタイプはGetParameter、説明はDescribeParametersから取得し、
   * 両方の取得に成功した場合のみ書き込む
   * @returns 移行先に書き込んだパラメータ
   */
  public async copyParameter(sourceName: string, destName: string): Promise<Parameter> {
    Logger.separator();

    const source = await this.fetchSource(sourceName);
    const summary = await this.fetchSummary(sourceName);

    const destination: Parameter = {
      name: destName,
      value: source.value,
      type: source.type,
      description: summary.description,
      kmsKeyId: source.type === PARAMETER_TYPES.SECURE_STRING ? summary.kmsKeyId : '',
      tier: summary.tier
    };

    Logger.copy(`Source parameter: ${sourceName}`);
    Logger.parameter({ ...source, description: summary.description, kmsKeyId: destination.kmsKeyId, tier: destination.tier });

    try {
      await this.store.put(destination, this.options.overwrite);
    } catch (error) {
      throw new DestinationWriteError(destName, error);
    }

    Logger.success(`Success copied parameter from ${sourceName} to ${destName}`);
    return destination;
  }

  private async fetchSource(name: string): Promise<Parameter> {
    try {
      return await this.store.getByName(name, true);
    } catch (error) {
      if (error instanceof ParameterNotFoundError) {
        throw new SourceNotFoundError(name, error);
      }
      throw new SourceFetchError(name, error);
    }
  }

  private async fetchSummary(name: string): Promise<ParameterSummary> {
    let summaries: ParameterSummary[];
    try {
      summaries = await this.store.describeByNameFilter(name);
    } catch (error) {
      throw new DescriptionFetchError(name, error);
    }

    const [summary] = summaries;
    if (!summary) {
      throw new DescriptionNotFoundError(name);
    }
    return summary;
  }
}
