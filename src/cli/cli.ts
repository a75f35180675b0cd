/**
 * savesync CLI
 *
 * Commands:
 *   savesync [sync] [--config <path>] [--max-backups <n>] [--timeout <seconds>]
 *   savesync devices [--config <path>]
 *   savesync backups [--config <path>]
 *   savesync config init [--config <path>] [--force]
 *   savesync config validate [--config <path>]
 */

import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { ConfigManager, expandHome } from '../config/config.js';
import { BackupStore } from '../backup/backup-store.js';
import { SyncOrchestrator } from '../sync/sync-orchestrator.js';
import type { SessionOpener } from '../device/types.js';
import { OutputFormatter } from './formatter.js';
import { ConsoleReporter } from './progress.js';
import type { SpinnerFactory } from './progress.js';

interface ConfigOption {
  config?: string;
}

interface SyncCommandOptions extends ConfigOption {
  maxBackups?: number;
  timeout?: number;
}

interface InitCommandOptions extends ConfigOption {
  force?: boolean;
}

export interface SaveSyncCLIOptions {
  /** Default: FTP */
  openSession?: SessionOpener;
  /** Default: ora */
  spinner?: SpinnerFactory;
  now?: () => Date;
}

const toNumber = (value: string): number => Number(value);

export class SaveSyncCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly options: SaveSyncCLIOptions;

  constructor(options: SaveSyncCLIOptions = {}, formatter: OutputFormatter = new OutputFormatter()) {
    this.options = options;
    this.formatter = formatter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('savesync')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Keep the newest copy of every emulator save on every device');

    // ── sync ───────────────────────────────────────────────────────────────
    program
      .command('sync', { isDefault: true })
      .description('Back up, reconcile and redistribute saves across all devices')
      .option('-c, --config <path>', 'Config file')
      .option('--max-backups <n>', 'Backup sets to keep, including the new one', toNumber)
      .option('--timeout <seconds>', 'Connect timeout per device', toNumber)
      .action(async (opts: SyncCommandOptions) => {
        try {
          const manager = new ConfigManager(opts.config);
          const config = manager.loadWithEnvOverrides();
          if (opts.maxBackups !== undefined) config.maxBackups = opts.maxBackups;
          if (opts.timeout !== undefined) config.connectTimeoutSeconds = opts.timeout;

          const orchestrator = new SyncOrchestrator(manager.toRunContext(config), {
            openSession: this.options.openSession,
            now: this.options.now,
            reporter: new ConsoleReporter({
              spinner: this.options.spinner,
              formatter: this.formatter,
            }),
          });
          await orchestrator.run();
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── devices ────────────────────────────────────────────────────────────
    program
      .command('devices')
      .description('List configured devices')
      .option('-c, --config <path>', 'Config file')
      .action((opts: ConfigOption) => {
        try {
          const config = new ConfigManager(opts.config).loadWithEnvOverrides();
          console.log(this.formatter.formatDeviceList(config.devices));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── backups ────────────────────────────────────────────────────────────
    program
      .command('backups')
      .description('List retained backup sets, oldest first')
      .option('-c, --config <path>', 'Config file')
      .action(async (opts: ConfigOption) => {
        try {
          const config = new ConfigManager(opts.config).loadWithEnvOverrides();
          const root = path.resolve(expandHome(config.backupFolder));
          const names = fs.existsSync(root) ? await new BackupStore(root).list() : [];
          console.log(this.formatter.formatBackupList(names, root));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── config ─────────────────────────────────────────────────────────────
    const config = program.command('config').description('Manage the savesync configuration');

    config
      .command('init')
      .description('Write a starter config file')
      .option('-c, --config <path>', 'Config file')
      .option('-f, --force', 'Overwrite an existing file')
      .action((opts: InitCommandOptions) => {
        try {
          const manager = new ConfigManager(opts.config);
          if (manager.exists() && !opts.force) {
            console.error(`❌ ${manager.path} already exists (use --force to overwrite)`);
            process.exitCode = 1;
            return;
          }
          manager.save(ConfigManager.example());
          console.log(`✅ Wrote starter config to ${manager.path}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    config
      .command('validate')
      .description('Validate the current configuration')
      .option('-c, --config <path>', 'Config file')
      .action((opts: ConfigOption) => {
        try {
          const manager = new ConfigManager(opts.config);
          const { valid, errors } = manager.validate(manager.loadWithEnvOverrides());
          if (valid) {
            console.log('✅ Configuration is valid');
          } else {
            console.error('❌ Configuration has errors:');
            for (const e of errors) {
              console.error(`  - ${e}`);
            }
            process.exitCode = 1;
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return program;
  }
}
