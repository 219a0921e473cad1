import * as readline from 'readline';
import { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { loadConfig } from '@aws-sdk/node-config-provider';
import { NODE_REGION_CONFIG_OPTIONS, NODE_REGION_CONFIG_FILE_OPTIONS } from '@aws-sdk/config-resolver';
import { AWSConfigOptions, AWSContext } from '../types';
import { Logger } from '../utils/logger';
import { ConfigLoadError, describeCause } from '../utils/errors';

// SSM/STSクライアントに渡す設定オブジェクト
export interface AWSClientConfig {
  region: string;
  credentials: ReturnType<typeof fromNodeProviderChain>;
}

/**
 * AWS認証情報と設定を管理するユーティリティクラス
 * AWS SDK v3の標準認証プロバイダーチェーンを使用し、
 * 環境変数、AWSプロファイル、IAMロールなどから認証情報を自動取得
 */
export class AWSCredentials {
  // AssumeRoleでMFAが必要な場合のコード入力プロンプト
  private static promptMfaCode(mfaSerial: string): Promise<string> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout
    });

    return new Promise<string>((resolve) => {
      rl.question(`Enter MFA code for ${mfaSerial}: `, (code: string) => {
        rl.close();
        resolve(code.trim());
      });
    });
  }

  /**
   * AWS SDKクライアント用の設定オブジェクトを生成
   * リージョンの優先順位: 明示的指定 > 環境変数 > 設定ファイル（指定プロファイル）
   */
  public static async createConfig(options: AWSConfigOptions = {}): Promise<AWSClientConfig> {
    const credentials = fromNodeProviderChain({
      profile: options.profile,
      mfaCodeProvider: (mfaSerial: string) => this.promptMfaCode(mfaSerial)
    });

    if (options.region) {
      return { region: options.region, credentials };
    }

    const regionProvider = loadConfig(NODE_REGION_CONFIG_OPTIONS, {
      ...NODE_REGION_CONFIG_FILE_OPTIONS,
      profile: options.profile
    });

    let region: string;
    try {
      region = await regionProvider();
    } catch (error) {
      throw new ConfigLoadError(
        `Could not resolve AWS region for profile '${options.profile ?? 'default'}'. Please set AWS_REGION environment variable or specify region with -r option. (${describeCause(error)})`
      );
    }

    return { region, credentials };
  }

  /**
   * AWS設定とコンテキスト情報を一度に取得
   * MFA認証を一回のみ実行し、設定オブジェクトと認証情報を返す
   */
  public static async createConfigWithContext(options: AWSConfigOptions = {}): Promise<{
    config: AWSClientConfig;
    context: AWSContext;
  }> {
    const config = await this.createConfig(options);

    try {
      const stsClient = new STSClient(config);
      const identity = await stsClient.send(new GetCallerIdentityCommand({}));

      const context: AWSContext = {
        account: identity.Account ?? 'unknown',
        region: config.region,
        arn: identity.Arn ?? 'unknown',
        profile: options.profile
      };

      return { config, context };
    } catch (error) {
      throw new ConfigLoadError(error);
    }
  }

  // 認証コンテキストを表示
  public static displayContext(context: AWSContext): void {
    Logger.info('AWS Context:');
    Logger.info(`  Account: ${context.account}`);
    Logger.info(`  Region:  ${context.region}`);
    Logger.info(`  User:    ${context.arn}`);
    if (context.profile) {
      Logger.info(`  Profile: ${context.profile}`);
    }
  }
}
