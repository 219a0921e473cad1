#!/usr/bin/env node

import { Command } from 'commander';
import { ParameterStoreService } from '../services/parameter-store.service';
import { MigrationService } from '../services/migration.service';
import { NameMapper } from '../services/name-mapper.service';
import { Logger } from '../utils/logger';
import { AWSCredentials } from '../config/awsCredentials';
import { MigrationCliOptions, resolveMigrationConfig, resolveProfile } from '../config/migration.config';
import { MIGRATION_DEFAULTS } from '../config/constants';
import { ValidationUtils } from '../utils/validation';
import { ConfigLoadError, describeCause } from '../utils/errors';

interface CliListOptions {
  environment: string;
  profile?: string;
  region?: string;
  pathPrefix?: string;
}

const program = new Command();

program
  .name('ssm-migrate')
  .description('Copy AWS Parameter Store parameters from the old naming hierarchy to the new one')
  .version('1.0.0');

// Migrate コマンド
program
  .command('migrate')
  .description('Copy parameters from /{namespace}/{env}/{name} to /{namespace}/{subsystem}/{env}/{name}')
  .option('-e, --environment <env>', 'Target environment (staging, beta, production)', MIGRATION_DEFAULTS.ENVIRONMENT)
  .option('-p, --profile <profile>', 'AWS profile (defaults to the environment profile)')
  .option('-r, --region <region>', 'AWS region')
  .option('--namespace <namespace>', 'Leading path segment shared by old and new names', MIGRATION_DEFAULTS.NAMESPACE)
  .option('--subsystem <subsystem>', 'Path segment inserted before the environment in new names', MIGRATION_DEFAULTS.SUBSYSTEM)
  .option('-v, --variable <names...>', 'Variable names to migrate (overrides the variables file)')
  .option('--variables-file <path>', 'JSON file with the list of variable names to migrate')
  .option('--overwrite', 'Overwrite destination parameters that already exist', false)
  .action(async (options: MigrationCliOptions) => {
    try {
      const migrationConfig = resolveMigrationConfig(options);
      const mapping = NameMapper.generateNameMapping(migrationConfig.environment, migrationConfig.variables, migrationConfig);

      // AWS認証情報・リージョン表示（設定とコンテキストを一度で取得）
      const { config, context } = await AWSCredentials.createConfigWithContext({
        region: migrationConfig.region,
        profile: migrationConfig.profile
      });
      AWSCredentials.displayContext(context);

      Logger.info(`Environment: ${migrationConfig.environment}`);
      Logger.info(`Found ${mapping.length} parameters to migrate`);

      const parameterStore = new ParameterStoreService(config);
      const migrationService = new MigrationService(parameterStore, { overwrite: migrationConfig.overwrite });
      const result = await migrationService.migrate(mapping);

      Logger.success(`Migration completed successfully: ${result.copied.length} parameters copied`);
    } catch (error) {
      Logger.error(`Migration failed: ${describeCause(error)}`);
      process.exit(1);
    }
  });

// List コマンド（移行前の確認・デバッグ用）
program
  .command('list')
  .description('List all parameters visible to the selected profile')
  .option('-e, --environment <env>', 'Target environment (staging, beta, production)', MIGRATION_DEFAULTS.ENVIRONMENT)
  .option('-p, --profile <profile>', 'AWS profile (defaults to the environment profile)')
  .option('-r, --region <region>', 'AWS region')
  .option('--path-prefix <prefix>', 'Only show parameters under this path prefix')
  .action(async (options: CliListOptions) => {
    try {
      const environment = options.environment;
      if (!ValidationUtils.isEnvironment(environment)) {
        throw new ConfigLoadError(ValidationUtils.validateEnvironment(environment).error);
      }

      const { config, context } = await AWSCredentials.createConfigWithContext({
        region: options.region,
        profile: options.profile ?? resolveProfile(environment)
      });
      AWSCredentials.displayContext(context);

      const parameterStore = new ParameterStoreService(config);
      const summaries = await parameterStore.listAll();
      const prefix = options.pathPrefix;
      const filtered = prefix ? summaries.filter(summary => summary.name.startsWith(prefix)) : summaries;

      Logger.header(`Parameters (${filtered.length} items)`);
      filtered.forEach(summary => {
        const description = summary.description ? ` - ${summary.description}` : '';
        console.log(`  ${summary.name} [${summary.type}]${description}`);
      });
    } catch (error) {
      Logger.error(`List failed: ${describeCause(error)}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  Logger.error(describeCause(error));
  process.exit(1);
});
