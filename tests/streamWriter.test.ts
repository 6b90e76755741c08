import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DestinationError, IncompleteTransferError } from '../src/download/core/errors';
import { StreamWriter, stagingPathFor } from '../src/download/core/StreamWriter';

describe('StreamWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'filefetch-writer-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should derive the staging path from the destination', () => {
    expect(stagingPathFor('/data/file.bin')).toBe('/data/file.bin.part');
    expect(stagingPathFor('/data/file.bin', '.tmp')).toBe('/data/file.bin.tmp');
  });

  it('should write to the staging file and only create the destination on commit', async () => {
    const destination = path.join(dir, 'out.bin');
    const writer = new StreamWriter(destination);

    await writer.open(0);
    await writer.write(Buffer.from('hello '));
    await writer.write(Buffer.from('world'));
    await writer.close();

    expect(writer.bytesWritten).toBe(11);
    expect(await fs.readFile(writer.stagingPath, 'utf8')).toBe('hello world');
    await expect(fs.stat(destination)).rejects.toThrow();

    expect(await writer.commit(11)).toBe(destination);
    expect(await fs.readFile(destination, 'utf8')).toBe('hello world');
    await expect(fs.stat(writer.stagingPath)).rejects.toThrow();
  });

  it('should create missing parent directories', async () => {
    const destination = path.join(dir, 'a', 'b', 'out.txt');
    const writer = new StreamWriter(destination);

    await writer.open(0);
    await writer.write(Buffer.from('x'));

    expect(await writer.commit(1)).toBe(destination);
  });

  it('should append after a matching staged prefix', async () => {
    const destination = path.join(dir, 'resume.txt');
    await fs.writeFile(stagingPathFor(destination), 'hello ');
    const writer = new StreamWriter(destination);

    expect(await writer.stagedBytes()).toBe(6);
    await writer.open(6);
    await writer.write(Buffer.from('world'));
    await writer.commit(11);

    expect(await fs.readFile(destination, 'utf8')).toBe('hello world');
  });

  it('should truncate a staging file longer than the resume offset', async () => {
    const destination = path.join(dir, 'trim.txt');
    await fs.writeFile(stagingPathFor(destination), 'abcdef');
    const writer = new StreamWriter(destination);

    await writer.open(3);
    await writer.write(Buffer.from('XY'));
    await writer.close();

    expect(await fs.readFile(writer.stagingPath, 'utf8')).toBe('abcXY');
  });

  it('should start over when opened at offset 0', async () => {
    const destination = path.join(dir, 'restart.txt');
    await fs.writeFile(stagingPathFor(destination), 'stale');
    const writer = new StreamWriter(destination);

    await writer.open(0);
    await writer.write(Buffer.from('new'));
    await writer.close();

    expect(await fs.readFile(writer.stagingPath, 'utf8')).toBe('new');
  });

  it('should refuse to resume past the staged bytes', async () => {
    const destination = path.join(dir, 'gap.txt');
    await fs.writeFile(stagingPathFor(destination), 'abc');
    const writer = new StreamWriter(destination);

    await expect(writer.open(10)).rejects.toBeInstanceOf(IncompleteTransferError);
  });

  it('should keep the staging file when the committed length is wrong', async () => {
    const destination = path.join(dir, 'short.bin');
    const writer = new StreamWriter(destination);
    await writer.open(0);
    await writer.write(Buffer.alloc(5));

    await expect(writer.commit(8)).rejects.toMatchObject({
      code: 'INCOMPLETE_TRANSFER',
      expected: 8,
      actual: 5,
    });
    expect((await fs.stat(writer.stagingPath)).size).toBe(5);
    await expect(fs.stat(destination)).rejects.toThrow();
  });

  it('should replace an existing destination on commit', async () => {
    const destination = path.join(dir, 'replace.txt');
    await fs.writeFile(destination, 'old');
    const writer = new StreamWriter(destination);

    await writer.open(0);
    await writer.write(Buffer.from('new'));
    await writer.commit(null);

    expect(await fs.readFile(destination, 'utf8')).toBe('new');
  });

  it('should remove the staging file on discard', async () => {
    const writer = new StreamWriter(path.join(dir, 'discard.bin'));
    await writer.open(0);
    await writer.write(Buffer.from('partial'));

    expect(await writer.discard()).toBe(true);
    expect(await writer.discard()).toBe(false);
    expect(await writer.stagedBytes()).toBe(0);
  });

  it('should reject writes before open', async () => {
    const writer = new StreamWriter(path.join(dir, 'closed.bin'));
    await expect(writer.write(Buffer.from('x'))).rejects.toThrow('StreamWriter.write() called before open()');
  });

  it('should surface filesystem failures as DestinationError', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const writer = new StreamWriter(path.join(blocker, 'out.bin'));

    await expect(writer.open(0)).rejects.toBeInstanceOf(DestinationError);
  });
});
