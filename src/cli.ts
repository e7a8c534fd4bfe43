#!/usr/bin/env node

import * as path from 'node:path';
import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { CloudProvider, ResourceKind } from './types';
import { loadSettings, loadSettingsFile, getDefaultSettings, saveSettings, CONFIG_FILE_NAMES } from './utils/config';
import logger, { addFileTransport, setLogLevel } from './utils/logger';
import { isMapping, parseProvider } from './utils/validators';
import { CloudConfig } from './cloud/config';
import { createCloudService, getAllServiceClasses, getServiceClass } from './cloud/index';

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packagePath = path.join(__dirname, '..', 'package.json');
  return packageSchema.parse(JSON.parse(fs.readFileSync(packagePath, 'utf-8'))).version;
}

// ─── Reporting ───────────────────────────────────────────────────────────────

const SECRET_KEY_PATTERN = /(password|secret|token|connection_?string|access_?key|api_?key)/i;

export function maskSecrets(value: unknown, key = ''): unknown {
  if (typeof value === 'function') return '[function]';
  if (Array.isArray(value)) return value.map((entry) => maskSecrets(entry));
  if (isMapping(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, maskSecrets(v, k)]),
    );
  }
  if (SECRET_KEY_PATTERN.test(key) && value !== null && value !== undefined && value !== '') {
    return '****';
  }
  return value;
}

export interface ConfigReport {
  provider: CloudProvider;
  region: string;
  projectId: string | null;
  tenantId: string | null;
  isCloud: boolean;
  service: string;
  view: unknown;
  storage: unknown;
  cache: unknown;
  queue: unknown;
}

function activeView(config: CloudConfig): unknown {
  switch (config.provider) {
    case CloudProvider.AWS: return config.awsConfig;
    case CloudProvider.AZURE: return config.azureConfig;
    case CloudProvider.GCP: return config.gcpConfig;
    case CloudProvider.HETZNER: return config.hetznerConfig;
    case CloudProvider.CUSTOM: return config.customProviderConfig;
    case CloudProvider.LOCAL: return config.localConfig;
  }
}

export function describeConfig(config: CloudConfig): ConfigReport {
  return {
    provider: config.provider,
    region: config.region,
    projectId: config.projectId,
    tenantId: config.tenantId,
    isCloud: config.isCloud,
    service: createCloudService(config).constructor.name,
    view: maskSecrets(activeView(config)),
    storage: maskSecrets(config.getStorageConfig()),
    cache: maskSecrets(config.getCacheConfig()),
    queue: maskSecrets(config.getQueueConfig()),
  };
}

function printReport(report: ConfigReport): void {
  console.log(chalk.bold.cyan('\n☁️  Cloud Configuration\n'));
  console.log(`  Provider: ${chalk.bold(report.provider)}`);
  console.log(`  Region: ${report.region}`);
  if (report.projectId) console.log(`  Project: ${report.projectId}`);
  if (report.tenantId) console.log(`  Tenant: ${report.tenantId}`);
  console.log(`  Managed cloud: ${report.isCloud ? chalk.green('yes') : chalk.yellow('no')}`);
  console.log(`  Service: ${report.service}`);
  console.log(chalk.bold('\n  Provider settings'));
  console.log(`    ${JSON.stringify(report.view)}`);
  console.log(chalk.bold('\n  Resources'));
  console.log(`    storage: ${JSON.stringify(report.storage)}`);
  console.log(`    cache:   ${JSON.stringify(report.cache)}`);
  console.log(`    queue:   ${JSON.stringify(report.queue)}`);
  console.log();
}

export type ProbeRow = { provider: CloudProvider } & Record<ResourceKind, boolean>;

export function probeProviders(): ProbeRow[] {
  return getAllServiceClasses().map(([provider, ServiceClass]) => ({
    provider,
    [ResourceKind.STORAGE]: ServiceClass.isAvailable(ResourceKind.STORAGE),
    [ResourceKind.CACHE]: ServiceClass.isAvailable(ResourceKind.CACHE),
    [ResourceKind.QUEUE]: ServiceClass.isAvailable(ResourceKind.QUEUE),
  }));
}

function loadCloudConfig(opts: { project: string; config?: string }): CloudConfig {
  const settings = opts.config
    ? loadSettingsFile(path.resolve(opts.config))
    : loadSettings(opts.project);
  return new CloudConfig(settings);
}

function fail(error: unknown): void {
  console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
}

// ─── CLI Setup ───────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cloudbridge')
    .description('Inspect and scaffold provider-neutral storage, cache and queue configuration')
    .version(readVersion())
    .option('-v, --verbose', 'Verbose output', false)
    .hook('preAction', (command) => {
      if (command.opts().verbose) setLogLevel('debug');
    });

  // ─── cloudbridge inspect ─────────────────────────────────────────────────

  program
    .command('inspect')
    .description('Resolve the cloud configuration and show what each resource kind maps to')
    .option('--project <path>', 'Project path', process.cwd())
    .option('--config <file>', 'Explicit settings file')
    .option('--json', 'Print JSON', false)
    .option('--log-file', 'Also write logs under .cloudbridge/logs', false)
    .action((opts: { project: string; config?: string; json: boolean; logFile: boolean }) => {
      try {
        if (opts.logFile) addFileTransport(opts.project);
        const report = describeConfig(loadCloudConfig(opts));
        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          printReport(report);
        }
      } catch (error) {
        fail(error);
      }
    });

  // ─── cloudbridge probe ───────────────────────────────────────────────────

  program
    .command('probe')
    .description('Show which provider client libraries are installed')
    .option('--json', 'Print JSON', false)
    .action((opts: { json: boolean }) => {
      const rows = probeProviders();
      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      console.log(chalk.bold.cyan('\n🔌 Client Libraries\n'));
      const kinds = Object.values(ResourceKind);
      console.log(`  ${'provider'.padEnd(10)}${kinds.map((k) => k.padEnd(10)).join('')}`);
      for (const row of rows) {
        const cells = kinds.map((kind) => (row[kind] ? chalk.green('✓'.padEnd(10)) : chalk.red('✗'.padEnd(10))));
        console.log(`  ${row.provider.padEnd(10)}${cells.join('')}`);
      }
      console.log();
    });

  // ─── cloudbridge init ────────────────────────────────────────────────────

  program
    .command('init')
    .description(`Write a starter ${CONFIG_FILE_NAMES[0]}`)
    .option('--project <path>', 'Project path', process.cwd())
    .option('--provider <provider>', `Provider (${Object.values(CloudProvider).join('|')})`, CloudProvider.LOCAL)
    .option('--force', 'Overwrite an existing settings file', false)
    .action((opts: { project: string; provider: string; force: boolean }) => {
      try {
        const provider = parseProvider(opts.provider, '--provider');
        const existing = CONFIG_FILE_NAMES
          .map((name) => path.join(opts.project, name))
          .find((file) => fs.existsSync(file));
        if (existing && !opts.force) {
          console.log(chalk.yellow(`${path.basename(existing)} already exists. Use --force to overwrite.`));
          return;
        }
        const filePath = saveSettings(opts.project, getDefaultSettings(provider));
        const ServiceClass = getServiceClass(provider);
        logger.info(`Wrote ${filePath}`);
        console.log(chalk.green(`✓ Created ${path.basename(filePath)} for provider "${provider}"`));
        if (ServiceClass && !ServiceClass.isAvailable()) {
          console.log(chalk.yellow('  Some client libraries for this provider are not installed. Run `cloudbridge probe`.'));
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

// ─── Entry point ─────────────────────────────────────────────────────────────

if (require.main === module) {
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    if (error.stack) logger.error(error.stack);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    logger.error(`Unhandled rejection: ${message}`);
    process.exit(1);
  });

  createProgram().parse(process.argv);
}
