import { describe, it, expect } from 'vitest';
import { FileType } from 'basic-ftp';
import { isListingArtifact, isPlainFileName, parseModifyTime, parseMlsdListing } from './mlsd.js';

describe('parseModifyTime', () => {
  it('parses YYYYMMDDHHMMSS as UTC', () => {
    expect(parseModifyTime('20240102090000')?.toISOString()).toBe('2024-01-02T09:00:00.000Z');
  });

  it('discards everything from the first dot', () => {
    expect(parseModifyTime('20240101100000.000')?.toISOString()).toBe('2024-01-01T10:00:00.000Z');
    expect(parseModifyTime('20240101100000.123')?.toISOString()).toBe('2024-01-01T10:00:00.000Z');
  });

  it('ignores surrounding whitespace', () => {
    expect(parseModifyTime(' 19991231235959 ')?.toISOString()).toBe('1999-12-31T23:59:59.000Z');
  });

  it('rejects malformed values', () => {
    expect(parseModifyTime('')).toBeNull();
    expect(parseModifyTime('2024010210')).toBeNull();
    expect(parseModifyTime('2024-01-02 09:00:00')).toBeNull();
    expect(parseModifyTime('.000')).toBeNull();
  });

  it('rejects impossible dates instead of rolling them over', () => {
    expect(parseModifyTime('20241301000000')).toBeNull();
    expect(parseModifyTime('20240230000000')).toBeNull();
    expect(parseModifyTime('20240101246000')).toBeNull();
  });
});

describe('isListingArtifact', () => {
  const path = 'retroarch/cores/savefiles/';

  it('flags the listed directory reported as a file', () => {
    expect(isListingArtifact('/retroarch/cores/savefiles', path)).toBe(true);
    expect(isListingArtifact('savefiles', path)).toBe(true);
    expect(isListingArtifact('cores/savefiles/', path)).toBe(true);
  });

  it('flags empty and dot entries', () => {
    expect(isListingArtifact('', path)).toBe(true);
    expect(isListingArtifact('/', path)).toBe(true);
    expect(isListingArtifact('.', path)).toBe(true);
    expect(isListingArtifact('..', path)).toBe(true);
  });

  it('keeps saves whose names merely occur inside the path', () => {
    expect(isListingArtifact('s', path)).toBe(false);
    expect(isListingArtifact('core', path)).toBe(false);
    expect(isListingArtifact('game.srm', path)).toBe(false);
  });

  it('accepts backslash-separated remote paths', () => {
    expect(isListingArtifact('savefiles', 'RetroArch\\savefiles')).toBe(true);
  });
});

describe('isPlainFileName', () => {
  it('accepts ordinary save names', () => {
    expect(isPlainFileName('game.srm')).toBe(true);
    expect(isPlainFileName('Zelda - A Link to the Past (USA).srm')).toBe(true);
  });

  it.each(['', '.', '..', '../escape.srm', 'a/b.srm', 'a\\b.srm', 'nul\0.srm'])(
    'rejects %j',
    (name) => {
      expect(isPlainFileName(name)).toBe(false);
    }
  );
});

describe('parseMlsdListing', () => {
  it('reads type, size and modify facts', () => {
    const [info] = parseMlsdListing('type=file;size=4096;modify=20240102090000.000; game.srm\r\n');

    expect(info.name).toBe('game.srm');
    expect(info.type).toBe(FileType.File);
    expect(info.size).toBe(4096);
    expect(info.rawModifiedAt).toBe('20240102090000.000');
    expect(info.modifiedAt?.toISOString()).toBe('2024-01-02T09:00:00.000Z');
  });

  it('keeps spaces inside file names', () => {
    const [info] = parseMlsdListing('type=file;modify=20240102090000; Super Game (USA).srm');
    expect(info.name).toBe('Super Game (USA).srm');
  });

  it('drops cdir and pdir entries and marks directories', () => {
    const infos = parseMlsdListing(
      ['type=cdir; .', 'type=pdir; ..', 'Type=Dir;modify=20240102090000; states'].join('\n')
    );

    expect(infos).toHaveLength(1);
    expect(infos[0].name).toBe('states');
    expect(infos[0].type).toBe(FileType.Directory);
  });

  it('leaves modifiedAt unset when the modify fact is unusable', () => {
    const [info] = parseMlsdListing('type=file;modify=yesterday; odd.srm');
    expect(info.modifiedAt).toBeUndefined();
    expect(info.rawModifiedAt).toBe('yesterday');
  });

  it('skips blank lines and lines without a name', () => {
    expect(parseMlsdListing('\r\n\r\ntype=file;size=1;\r\n')).toEqual([]);
  });
});
