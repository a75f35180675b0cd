/**
 * MLSD listing support (RFC 3659).
 *
 * Some handheld FTP daemons append fractional seconds to the `modify` fact
 * (`20240102090000.000`) and list the working directory itself as a file
 * entry. Both quirks are handled here so the session layer only ever sees
 * plain files with whole-second timestamps.
 */

import { FileInfo, FileType } from 'basic-ftp';

const MODIFY_RE = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/**
 * Parse an MLSD `modify` fact. Everything from the first `.` on is
 * discarded; the rest must be `YYYYMMDDHHMMSS` and is read as UTC.
 * Returns null for anything else, including impossible dates.
 */
export function parseModifyTime(raw: string): Date | null {
  const whole = raw.trim().split('.')[0];
  const match = MODIFY_RE.exec(whole);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map((n) => parseInt(n, 10));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls over out-of-range fields (month 13, day 32, ...)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return date;
}

/**
 * True if a listing entry is a pseudo-entry for the directory being listed
 * rather than a save: empty, `.`/`..`, or a run of whole path segments of
 * the device's own remote path (`/retroarch/cores/savefiles`).
 */
export function isListingArtifact(name: string, remotePath: string): boolean {
  const nameSegments = name.split('/').filter((s) => s !== '');
  if (nameSegments.length === 0) return true;
  if (nameSegments.length === 1 && (nameSegments[0] === '.' || nameSegments[0] === '..')) {
    return true;
  }

  const pathSegments = remotePath.split(/[\\/]+/).filter((s) => s !== '');
  for (let start = 0; start + nameSegments.length <= pathSegments.length; start++) {
    if (nameSegments.every((seg, i) => pathSegments[start + i] === seg)) {
      return true;
    }
  }
  return false;
}

/**
 * True if `name` can be written beside other saves as-is: non-empty, not
 * `.`/`..`, and free of path separators and NUL. Anything else would
 * resolve outside the device's backup folder.
 */
export function isPlainFileName(name: string): boolean {
  if (name === '' || name === '.' || name === '..') return false;
  return !/[\\/\0]/.test(name);
}

/**
 * Parse a raw MLSD response body into FileInfo entries.
 *
 * Installed as the FTP client's list parser so that `modify` facts go
 * through parseModifyTime. `cdir` and `pdir` entries are dropped.
 */
export function parseMlsdListing(rawList: string): FileInfo[] {
  const files: FileInfo[] = [];

  for (const line of rawList.split(/\r?\n/)) {
    if (line.trim() === '') continue;
    // "fact=value;fact=value; name" — the name follows the first space
    const sep = line.indexOf(' ');
    if (sep < 0) continue;

    const info = new FileInfo(line.slice(sep + 1));
    let selfOrParent = false;

    for (const fact of line.slice(0, sep).split(';')) {
      const eq = fact.indexOf('=');
      if (eq < 0) continue;
      const key = fact.slice(0, eq).toLowerCase();
      const value = fact.slice(eq + 1);

      switch (key) {
        case 'type': {
          const type = value.toLowerCase();
          if (type === 'cdir' || type === 'pdir') {
            selfOrParent = true;
          } else if (type === 'dir') {
            info.type = FileType.Directory;
          } else if (type === 'file') {
            info.type = FileType.File;
          } else if (type.startsWith('os.unix=slink') || type.startsWith('os.unix=symlink')) {
            info.type = FileType.SymbolicLink;
          }
          break;
        }
        case 'size':
        case 'sizd':
          info.size = parseInt(value, 10) || 0;
          break;
        case 'modify': {
          info.rawModifiedAt = value;
          const parsed = parseModifyTime(value);
          if (parsed) info.modifiedAt = parsed;
          break;
        }
        case 'unique':
          info.uniqueID = value;
          break;
      }
    }

    if (!selfOrParent) files.push(info);
  }

  return files;
}
