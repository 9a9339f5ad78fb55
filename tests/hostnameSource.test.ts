import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { ErrorCode } from '../src/core/errors.js';
import { parseHostnameTsv, readHostnameTsv, reverseHostname } from '../src/util/hostnameSource.js';

describe('reverseHostname', () => {
  it('turns exporter names back into hostnames', () => {
    expect(reverseHostname('com.example.www')).toBe('www.example.com');
    expect(reverseHostname('org.example')).toBe('example.org');
  });

  it('is its own inverse', () => {
    for (const name of ['', 'localhost', 'a.b', 'com.example.www', '.leading', 'trailing.', 'a..b']) {
      expect(reverseHostname(reverseHostname(name))).toBe(name);
    }
  });

  it('leaves single labels and empty input alone', () => {
    expect(reverseHostname('localhost')).toBe('localhost');
    expect(reverseHostname('')).toBe('');
  });
});

describe('parseHostnameTsv', () => {
  it('reverses the first column of every row', () => {
    const content = 'com.example.www\t1520\n\norg.example\t3\textra\n';
    expect(parseHostnameTsv(content)).toEqual(['www.example.com', 'example.org']);
  });

  it('accepts rows with a single column', () => {
    expect(parseHostnameTsv('net.example.api\n')).toEqual(['api.example.net']);
  });

  it('rejects rows it cannot parse', () => {
    let caught: unknown;
    try {
      parseHostnameTsv('"com.example\t1\n');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: ErrorCode.INPUT_FILE_MALFORMED, message: 'Issue parsing entry in tsv file' });
  });
});

describe('readHostnameTsv', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chain-auditor-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads hostnames from a file', async () => {
    const path = join(dir, 'stats.tsv');
    await writeFile(path, 'com.example.www\t12\nio.example.status\t4\n');
    expect(await readHostnameTsv(path)).toEqual(['www.example.com', 'status.example.io']);
  });

  it('reports a file it cannot open', async () => {
    const path = join(dir, 'missing.tsv');
    await expect(readHostnameTsv(path)).rejects.toMatchObject({
      code: ErrorCode.INPUT_FILE_UNREADABLE,
      message: `Couldn't open the tsv file ${path}`,
    });
  });
});
