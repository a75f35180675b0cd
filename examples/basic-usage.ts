/**
 * Basic Usage Example
 *
 * Runs one sync from code instead of the CLI, using the config file and
 * any SAVESYNC_* variables in a local .env file.
 */

import { ConfigManager, SyncOrchestrator, ErrorHandler } from '../src/index.js';
import dotenv from 'dotenv';

dotenv.config();

async function main() {
  // 1. Load config (~/.savesync/config.json unless SAVESYNC_CONFIG points elsewhere)
  const manager = new ConfigManager(process.env.SAVESYNC_CONFIG);
  const context = manager.toRunContext(manager.loadWithEnvOverrides());

  console.log(`Syncing ${context.devices.length} device(s)...`);

  // 2. Run the sync; device failures are reported, only storage errors end up here
  const outcome = await ErrorHandler.wrap(() => new SyncOrchestrator(context).run(), {
    devices: context.devices.length,
  });
  if (outcome.error) {
    console.error(ErrorHandler.toUserMessage(outcome.error));
    process.exitCode = 1;
    return;
  }
  const result = outcome.data;

  // 3. Inspect the outcome
  for (const save of result.reconciled) {
    console.log(`${save.filename}: newest on ${save.winner.device}`);
  }
  for (const report of result.devices) {
    if (report.failure) {
      console.log(`${report.device}: ${ErrorHandler.toUserMessage(report.failure.error)}`);
    }
  }
}

main().catch((err) => console.error(ErrorHandler.toUserMessage(err)));
