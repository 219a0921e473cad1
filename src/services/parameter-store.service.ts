import {
  DescribeParametersCommand,
  GetParameterCommand,
  ParameterMetadata,
  PutParameterCommand,
  SSMClient,
  SSMClientConfig
} from '@aws-sdk/client-ssm';
import { Parameter, ParameterStoreClient, ParameterSummary, ParameterType } from '../types';
import { Logger } from '../utils/logger';
import { ParameterNotFoundError } from '../utils/errors';
import { ValidationUtils } from '../utils/validation';
import { AWS_LIMITS, PARAMETER_TYPES } from '../config/constants';

/**
 * AWS Parameter Storeとの連携を担当するサービスクラス
 * 移行処理に必要な一覧取得、単一取得、メタデータ検索、書き込みのみを提供
 * AWS SDK v3を使用してSSMサービスと通信
 */
export class ParameterStoreService implements ParameterStoreClient {
  private ssmClient: SSMClient; // AWS SSMクライアントのインスタンス

  /**
   * @param config - 事前設定済みのAWS設定オブジェクト（MFA認証済み等）
   */
  constructor(config: SSMClientConfig) {
    if (!config.region) {
      throw new Error('AWS region is required. Please specify region via -r option or AWS_REGION environment variable.');
    }
    this.ssmClient = new SSMClient(config);
  }

  /**
   * 全パラメータのメタデータをページ分割で取得する
   * NextTokenがなくなるまで全ページを取得
   */
  public async listAll(): Promise<ParameterSummary[]> {
    const summaries: ParameterSummary[] = [];
    let nextToken: string | undefined; // ページネーション用のトークン
    let pageCount = 0;

    do {
      pageCount++;
      const response = await this.ssmClient.send(new DescribeParametersCommand({
        MaxResults: AWS_LIMITS.DESCRIBE_PARAMETERS_MAX_RESULTS,
        NextToken: nextToken
      }));

      const page = response.Parameters || [];
      summaries.push(...page.map(metadata => this.toSummary(metadata)));
      Logger.debug(`Page ${pageCount}: Retrieved ${page.length} parameters`);

      nextToken = response.NextToken;
    } while (nextToken);

    return summaries;
  }

  /**
   * 単一パラメータを値付きで取得する
   * 存在しない場合は ParameterNotFoundError、その他のAWSエラーはそのまま投げる
   */
  public async getByName(name: string, decrypt: boolean): Promise<Parameter> {
    Logger.debug(`Getting parameter details for: ${name}`);

    try {
      const response = await this.ssmClient.send(new GetParameterCommand({
        Name: name,
        WithDecryption: decrypt
      }));

      if (!response.Parameter) {
        throw new ParameterNotFoundError(name);
      }

      return {
        name: response.Parameter.Name || name,
        value: response.Parameter.Value || '',
        type: this.toParameterType(response.Parameter.Type, name),
        description: '', // GetParameterCommandでは取得できない
        kmsKeyId: ''
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'ParameterNotFound') {
        throw new ParameterNotFoundError(name);
      }
      throw error;
    }
  }

  // 名前の完全一致フィルタでメタデータを検索（0件または1件を想定）
  public async describeByNameFilter(name: string): Promise<ParameterSummary[]> {
    const response = await this.ssmClient.send(new DescribeParametersCommand({
      ParameterFilters: [
        {
          Key: 'Name',
          Option: 'Equals',
          Values: [name]
        }
      ]
    }));

    return (response.Parameters || []).map(metadata => this.toSummary(metadata));
  }

  public async put(parameter: Parameter, overwrite: boolean): Promise<void> {
    await this.ssmClient.send(new PutParameterCommand({
      Name: parameter.name,
      Value: parameter.value,
      Type: parameter.type,
      Description: parameter.description,
      Overwrite: overwrite,
      // KMSキーはSecureStringの場合のみ指定可能
      ...(parameter.type === PARAMETER_TYPES.SECURE_STRING && parameter.kmsKeyId ? { KeyId: parameter.kmsKeyId } : {}),
      // Advancedの値（4KB超）はStandardに書き込めないため、移行元の階層を引き継ぐ
      ...(parameter.tier ? { Tier: parameter.tier } : {})
    }));
  }

  private toSummary(metadata: ParameterMetadata): ParameterSummary {
    const name = metadata.Name || '';
    return {
      name,
      type: this.toParameterType(metadata.Type, name),
      description: metadata.Description || '',
      kmsKeyId: metadata.KeyId || '',
      tier: metadata.Tier,
      lastModifiedDate: metadata.LastModifiedDate,
      version: metadata.Version
    };
  }

  // 未知のタイプをStringとして扱うと型が変わってしまうため、エラーにする
  private toParameterType(type: string | undefined, name: string): ParameterType {
    if (!ValidationUtils.isParameterType(type)) {
      throw new Error(`Unsupported parameter type '${type ?? 'undefined'}' for ${name}`);
    }
    return type;
  }
}
