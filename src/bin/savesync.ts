#!/usr/bin/env node
/**
 * savesync CLI entry point
 *
 * Compiled to dist/bin/savesync.js by TypeScript.
 * Registered as the `savesync` binary in package.json.
 */

import dotenv from 'dotenv';
import { SaveSyncCLI } from '../cli/cli.js';

dotenv.config();

const cli = new SaveSyncCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
