import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DownloadCache } from '../src/download/cache/DownloadCache';
import { DownloadOrchestrator } from '../src/download/core/DownloadOrchestrator';
import {
  CancelledError,
  ResolutionError,
  TransientNetworkError,
  UnreachableError,
} from '../src/download/core/errors';
import {
  clearDownloadCache,
  downloadFile,
  downloadFileSmart,
  getUrlContentType,
  getUrlFilename,
  guessUrlFilename,
} from '../src/download/helpers';
import { FakeResourceOptions, FakeTransport } from './helpers/FakeTransport';

const URL = 'https://files.example.test/media/42';

describe('download helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'filefetch-helpers-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function orchestrator(resource: FakeResourceOptions): DownloadOrchestrator {
    return new DownloadOrchestrator({
      transport: new FakeTransport(resource),
      cache: new DownloadCache(path.join(dir, 'cache')),
      defaults: { directory: dir },
      sleep: async () => undefined,
    });
  }

  describe('downloadFile', () => {
    it('should resolve to the destination path', async () => {
      const destination = path.join(dir, 'out.bin');

      const result = await downloadFile(URL, destination, {
        orchestrator: orchestrator({ data: Buffer.from('content') }),
      });

      expect(result).toBe(destination);
      expect(await fs.readFile(destination, 'utf8')).toBe('content');
    });

    it('should throw the failure error', async () => {
      const failing = orchestrator({
        data: Buffer.from('content'),
        openErrors: [new UnreachableError(URL, 'HTTP 410 Gone', { status: 410 })],
      });

      await expect(downloadFile(URL, path.join(dir, 'gone.bin'), { orchestrator: failing })).rejects.toMatchObject({
        name: 'UnreachableError',
        status: 410,
      });
    });

    it('should throw CancelledError carrying the staging path', async () => {
      const controller = new AbortController();
      controller.abort();
      const destination = path.join(dir, 'cancelled.bin');

      const error = await downloadFile(URL, destination, {
        orchestrator: orchestrator({ data: Buffer.from('content') }),
        signal: controller.signal,
      }).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(CancelledError);
      expect(error).toMatchObject({ code: 'CANCELLED', stagingPath: `${destination}.part` });
    });

    it('should pass retry options through', async () => {
      const flaky = orchestrator({
        data: Buffer.alloc(5000),
        failures: [{ afterBytes: 100 }, { afterBytes: 100 }],
      });

      await expect(
        downloadFile(URL, path.join(dir, 'flaky.bin'), { orchestrator: flaky, maxRetries: 1 }),
      ).rejects.toBeInstanceOf(TransientNetworkError);
    });
  });

  describe('downloadFileSmart', () => {
    it('should name the file from the response', async () => {
      const result = await downloadFileSmart(URL, path.join(dir, 'inbox'), {
        orchestrator: orchestrator({
          data: Buffer.from('<svg/>'),
          contentType: 'image/svg+xml',
        }),
      });

      expect(result).toBe(path.join(dir, 'inbox', '42.svg'));
      expect(await fs.readFile(result, 'utf8')).toBe('<svg/>');
    });
  });

  describe('probing helpers', () => {
    it('should return the declared filename', async () => {
      const transport = new FakeTransport({
        data: Buffer.alloc(1),
        contentDisposition: 'attachment; filename="invoice-7.pdf"',
      });

      expect(await getUrlFilename(URL, transport)).toBe('invoice-7.pdf');
    });

    it('should throw ResolutionError without Content-Disposition', async () => {
      const transport = new FakeTransport({ data: Buffer.alloc(1) });

      await expect(getUrlFilename(URL, transport)).rejects.toThrow(
        new ResolutionError(`Missing 'Content-Disposition' filename in '${URL}' response`),
      );
    });

    it('should return the content type or null', async () => {
      expect(
        await getUrlContentType(URL, new FakeTransport({ data: Buffer.alloc(1), contentType: 'text/plain' })),
      ).toBe('text/plain');
      expect(await getUrlContentType(URL, new FakeTransport({ data: Buffer.alloc(1) }))).toBeNull();
    });

    it('should guess the filename a download would use', async () => {
      const transport = new FakeTransport({ data: Buffer.alloc(1), contentType: 'image/png' });

      expect(await guessUrlFilename(URL, transport)).toBe('42.png');
    });
  });

  describe('clearDownloadCache', () => {
    it('should empty the given cache', async () => {
      const cache = new DownloadCache(path.join(dir, 'cache'));
      const source = path.join(dir, 'source.bin');
      await fs.writeFile(source, 'x');
      await cache.store(URL, source);

      await clearDownloadCache(cache);

      expect(await cache.isEmpty()).toBe(true);
    });
  });
});
