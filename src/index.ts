/**
 * savesync - keep emulator saves in step across devices over FTP
 *
 * Main entry point for the library.
 */

// Devices and the FTP transport
export * from './device/index.js';

// Backups
export * from './backup/index.js';

// Reconciliation and the sync run
export * from './sync/index.js';

// Config
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// CLI
export * from './cli/index.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';
