import vm from 'vm';
import {
  CancelledError,
  DestinationError,
  DownloadError,
  errorMessage,
  IncompleteTransferError,
  isErrnoException,
  ResolutionError,
  TransientNetworkError,
  toDestinationError,
  UnreachableError,
} from '../src/download/core/errors';

describe('download errors', () => {
  it.each([
    [new ResolutionError('no name'), 'RESOLUTION_FAILED', 'ResolutionError'],
    [new UnreachableError('https://h.example.test', 'gone', { status: 404 }), 'UNREACHABLE', 'UnreachableError'],
    [new TransientNetworkError('reset'), 'TRANSIENT_NETWORK', 'TransientNetworkError'],
    [new IncompleteTransferError('short', 10, 5), 'INCOMPLETE_TRANSFER', 'IncompleteTransferError'],
    [new IncompleteTransferError('changed', 10, 5, 'RESOURCE_CHANGED'), 'RESOURCE_CHANGED', 'IncompleteTransferError'],
    [new DestinationError('/tmp/x', 'denied'), 'DESTINATION', 'DestinationError'],
    [new CancelledError('/tmp/x.part', 'timeout'), 'CANCELLED', 'CancelledError'],
  ])('should tag %p with its code', (error, code, name) => {
    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('should describe a cancellation by its reason', () => {
    expect(new CancelledError('/tmp/x.part', 'signal').message).toBe('Download cancelled (signal)');
  });

  describe('toDestinationError', () => {
    it('should wrap filesystem errors with their errno', () => {
      const cause = Object.assign(new Error("EACCES: permission denied, open '/srv/out.bin'"), { code: 'EACCES' });

      const error = toDestinationError(cause, '/srv/out.bin', 'open');

      expect(error).toBeInstanceOf(DestinationError);
      expect(error.message).toBe("Failed to open /srv/out.bin: EACCES: permission denied, open '/srv/out.bin'");
      expect(error).toMatchObject({ errno: 'EACCES', path: '/srv/out.bin' });
      expect(error.cause).toBe(cause);
    });

    it('should read errno and message from errors of another realm', () => {
      const foreign: unknown = vm.runInNewContext(
        `Object.assign(new Error("ENOENT: no such file or directory"), { code: "ENOENT" })`,
      );

      expect(foreign instanceof Error).toBe(false);
      expect(isErrnoException(foreign)).toBe(true);
      expect(errorMessage(foreign)).toBe('ENOENT: no such file or directory');
      expect(toDestinationError(foreign, '/srv/out.bin', 'stat')).toMatchObject({
        errno: 'ENOENT',
        message: 'Failed to stat /srv/out.bin: ENOENT: no such file or directory',
      });
    });

    it('should leave engine errors untouched', () => {
      const original = new IncompleteTransferError('short', 10, 5);
      expect(toDestinationError(original, '/srv/out.bin', 'write')).toBe(original);
    });
  });
});
