import { NameMapping, NameMappingEntry, NameMappingOptions } from '../types';

/**
 * 旧パラメータ階層から新階層への名前対応表を生成するサービスクラス
 * 純粋な文字列整形のみで、外部への副作用は持たない
 */
export class NameMapper {
  // 旧形式 /{namespace}/{environment}/{variableName}
  public static buildOldName(namespace: string, environment: string, variableName: string): string {
    return `/${namespace}/${environment}/${variableName}`;
  }

  // 新形式 /{namespace}/{subsystem}/{environment}/{variableName}
  public static buildNewName(namespace: string, subsystem: string, environment: string, variableName: string): string {
    return `/${namespace}/${subsystem}/${environment}/${variableName}`;
  }

  /**
   * 変数識別子リストから旧パス → 新パスの対応表を生成
   * 出力順は入力順。重複した識別子は最初の1件のみ残す
   */
  public static generateNameMapping(
    environment: string,
    variables: readonly string[],
    options: NameMappingOptions
  ): NameMapping {
    const seen = new Set<string>();
    const mapping: NameMappingEntry[] = [];

    for (const variableName of variables) {
      if (seen.has(variableName)) {
        continue;
      }
      seen.add(variableName);
      mapping.push({
        variableName,
        oldName: this.buildOldName(options.namespace, environment, variableName),
        newName: this.buildNewName(options.namespace, options.subsystem, environment, variableName)
      });
    }

    return mapping;
  }
}
