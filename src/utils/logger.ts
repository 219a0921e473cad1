import chalk from 'chalk';
import { Parameter } from '../types';
import { PARAMETER_TYPES } from '../config/constants';

/**
 * コンソール出力用のアイコン定義
 * ログレベルごとに異なるアイコンで視覚的に区別
 */
const ICONS = {
  info: '[i]',      // 情報メッセージ
  success: '[✓]',   // 成功メッセージ
  warning: '[!]',    // 警告メッセージ
  error: '[x]',      // エラーメッセージ
  copy: '[>]',       // コピー操作
  debug: '[d]'       // デバッグメッセージ
} as const;

/**
 * アプリケーションのログ出力を管理するユーティリティクラス
 * タイムスタンプ付きの色付きログ、アイコン付きメッセージを提供
 */
export class Logger {
  private static log(iconKey: keyof typeof ICONS, message: string, color?: (text: string) => string): void {
    const timestamp = chalk.gray(new Date().toISOString());
    const icon = ICONS[iconKey];
    const coloredIcon = color ? color(icon) : icon;
    const coloredMessage = color ? color(message) : message;
    console.log(`${coloredIcon} ${timestamp} ${coloredMessage}`);
  }

  public static info(message: string): void {
    this.log('info', message, chalk.blue);
  }

  public static success(message: string): void {
    this.log('success', message, chalk.green);
  }

  public static warning(message: string): void {
    this.log('warning', message, chalk.yellow);
  }

  public static error(message: string): void {
    const timestamp = chalk.gray(new Date().toISOString());
    console.error(`${chalk.red(ICONS.error)} ${timestamp} ${chalk.red(message)}`);
  }

  public static copy(message: string): void {
    this.log('copy', message, chalk.cyan);
  }

  public static debug(message: string): void {
    this.log('debug', message, chalk.gray);
  }

  public static separator(): void {
    console.log(chalk.gray('-'.repeat(60)));
  }

  public static header(title: string): void {
    console.log(`\n${chalk.bold.green(`> ${title}`)}`);
    this.separator();
  }

  // SecureStringの値は先頭と末尾3文字のみ表示
  public static maskValue(value: string): string {
    if (value.length <= 8) {
      return '*'.repeat(value.length);
    }
    return value.substring(0, 3) + '*'.repeat(value.length - 6) + value.substring(value.length - 3);
  }

  // 読み込んだパラメータの詳細を表示
  public static parameter(param: Parameter): void {
    const value = param.type === PARAMETER_TYPES.SECURE_STRING ? this.maskValue(param.value) : param.value;
    console.log(`    Name: ${param.name}`);
    console.log(`    Value: ${value}`);
    console.log(`    Type: ${param.type}`);
    console.log(`    Description: ${param.description || '(not set)'}`);
    if (param.kmsKeyId) {
      console.log(`    KMS: ${param.kmsKeyId}`);
    }
    if (param.tier) {
      console.log(`    Tier: ${param.tier}`);
    }
  }

  public static summary(result: { copied: number; total: number }): void {
    console.log();
    this.separator();
    console.log(chalk.bold('[Summary]'));
    console.log(`  ${chalk.green(`${ICONS.success} Copied:`)} ${result.copied}/${result.total}`);
    this.separator();
  }
}
