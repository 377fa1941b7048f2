import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileProgressLedger } from '../../../src/infrastructure/adapters/filesystem/file-progress-ledger.adapter';

describe('FileProgressLedger', () => {
  let workDir: string;
  let ledgerPath: string;
  let ledger: FileProgressLedger;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'ledger-'));
    ledgerPath = join(workDir, 'WGS4taxid548681.tmp');
    ledger = new FileProgressLedger(ledgerPath);
  });

  afterEach(async () => {
    await ledger.close();
    await rm(workDir, { recursive: true, force: true });
  });

  it('should report a missing ledger as empty', async () => {
    expect(await ledger.exists()).toBe(false);
    expect(await ledger.load()).toEqual(new Set());
  });

  it('should append one id per line', async () => {
    await ledger.record('AAAA01');
    await ledger.record('BBBB01');

    expect(await readFile(ledgerPath, 'utf8')).toBe('AAAA01\nBBBB01\n');
    expect(await ledger.exists()).toBe(true);
  });

  it('should load ids written by a previous run, ignoring blank lines', async () => {
    await writeFile(ledgerPath, 'AAAA01\n\nBBBB01\r\n');

    expect(await ledger.load()).toEqual(new Set(['AAAA01', 'BBBB01']));
  });

  it('should keep existing entries when appending', async () => {
    await writeFile(ledgerPath, 'AAAA01\n');

    await ledger.record('BBBB01');

    expect(await readFile(ledgerPath, 'utf8')).toBe('AAAA01\nBBBB01\n');
  });

  it('should remove the file on clear, even if it is missing', async () => {
    await ledger.record('AAAA01');
    await ledger.clear();
    await ledger.clear();

    expect(await ledger.exists()).toBe(false);
  });
});
