/**
 * savesync Output Formatter
 *
 * Formats run results, device lists and backup lists into human-readable
 * strings for CLI output.
 */

import type { DeviceConfig } from '../config/config.js';
import { ErrorHandler } from '../errors/index.js';
import type { SyncRunResult } from '../sync/types.js';

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number): string {
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

export function red(text: string): string {
  return `${RED}${text}${RESET}`;
}

/** `2024-01-02 09:00:00`, in UTC like the FTP modify fact it usually comes from. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export class OutputFormatter {
  /**
   * One line per device plus the backup set and counts.
   */
  formatRunSummary(result: SyncRunResult): string {
    const lines: string[] = [header('Sync Summary')];
    lines.push(field('Backup set', result.backupSet.name));
    lines.push(field('Old backups removed', result.pruned.length));
    lines.push(field('Saves reconciled', result.reconciled.length));
    lines.push('');

    for (const report of result.devices) {
      const name = `${BOLD}${report.device.padEnd(16)}${RESET}`;
      const counts = `${report.downloaded.length} down, ${report.uploaded.length} up`;
      if (report.failure) {
        lines.push(`  ${name} ${RED}✗ ${report.failure.stage} failed${RESET} ${DIM}(${counts})${RESET}`);
      } else {
        lines.push(`  ${name} ${GREEN}✓${RESET} ${counts}`);
      }
    }
    return lines.join('\n');
  }

  /**
   * Configured devices. Passwords are never printed.
   */
  formatDeviceList(devices: readonly DeviceConfig[]): string {
    if (!devices.length) {
      return `${YELLOW}No devices configured.${RESET}`;
    }
    const lines: string[] = [header(`Devices (${devices.length})`)];
    devices.forEach((d, i) => {
      const login = d.username ? `${d.username}@` : '';
      lines.push(`  ${DIM}${String(i + 1).padStart(3)}.${RESET} ${BOLD}${d.name}${RESET}`);
      lines.push(`       ${DIM}ftp://${login}${d.hostname}:${d.port} → ${d.remotePath}${RESET}`);
      if (!d.username) lines.push(`       ${DIM}anonymous login${RESET}`);
    });
    return lines.join('\n');
  }

  /**
   * Backup sets, oldest first.
   */
  formatBackupList(names: readonly string[], root: string): string {
    if (!names.length) {
      return `${YELLOW}No backups in ${root}.${RESET}`;
    }
    const lines: string[] = [header(`Backups (${names.length})`), field('Folder', root)];
    names.forEach((name, i) => {
      lines.push(`  ${DIM}${String(i + 1).padStart(3)}.${RESET} ${name}`);
    });
    return lines.join('\n');
  }

  /**
   * Format an error into a friendly, actionable message.
   */
  formatError(error: unknown): string {
    return `\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`;
  }
}
