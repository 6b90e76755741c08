import { Writable } from 'stream';
import {
  catchDownloadProgress,
  formatBytes,
  formatDuration,
  ProgressBar,
} from '../src/download/progress/ProgressBar';
import { ProgressSnapshot, TransferPhase } from '../src/download/core/types';

class CaptureStream extends Writable {
  readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }
}

function snapshot(overrides: Partial<ProgressSnapshot> = {}): ProgressSnapshot {
  return {
    bytesTransferred: 1024,
    totalBytes: 4096,
    percentage: 25,
    rate: 512,
    elapsedMs: 2000,
    etaSeconds: 6,
    phase: TransferPhase.STREAMING,
    ...overrides,
  };
}

describe('formatBytes', () => {
  it.each([
    [0, '0B'],
    [512, '512B'],
    [1024, '1.0KB'],
    [1536, '1.5KB'],
    [10 * 1024 * 1024, '10.0MB'],
    [3 * 1024 ** 3, '3.0GB'],
  ])('should format %i as %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe('formatDuration', () => {
  it.each([
    [0.2, '1s'],
    [59, '59s'],
    [61, '1m01s'],
    [3599, '59m59s'],
    [3661, '1h01m'],
  ])('should format %p seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe('ProgressBar', () => {
  it('should render a bar with counts, rate and eta', () => {
    const bar = new ProgressBar({ width: 8, stream: new CaptureStream() });

    expect(bar.render(snapshot())).toBe('downloading |██      | [1.0KB/4.0KB] 25% 512B/s eta 6s');
  });

  it('should render a spinner when the total is unknown', () => {
    const bar = new ProgressBar({ width: 8, prefix: 'fetching', stream: new CaptureStream() });

    expect(
      bar.render(snapshot({ bytesTransferred: 2048, totalBytes: null, percentage: null, rate: 0, etaSeconds: null })),
    ).toBe('fetching .          [2.0KB] 0B/s');
  });

  it('should redraw in place and hide the cursor once', () => {
    const stream = new CaptureStream();
    const bar = new ProgressBar({ width: 4, fill: '#', empty: '-', stream });

    bar.update(snapshot({ percentage: 50 }));
    bar.update(snapshot({ percentage: 100, etaSeconds: 0 }));

    expect(stream.chunks).toEqual([
      '\x1b[?25l',
      '\rdownloading |##--| [1.0KB/4.0KB] 50% 512B/s eta 6s ',
      '\rdownloading |####| [1.0KB/4.0KB] 100% 512B/s eta 0s ',
    ]);
  });

  it('should finish the line and restore the cursor exactly once', () => {
    const stream = new CaptureStream();
    const bar = new ProgressBar({ width: 4, fill: '#', empty: '-', stream });

    bar.update(snapshot());
    bar.end(snapshot({ percentage: 50 }), 'aborted');
    bar.end(snapshot(), 'completed');
    bar.update(snapshot());

    expect(bar.isEnded).toBe(true);
    expect(stream.chunks.slice(2)).toEqual([
      '\rdownloading |##--| [1.0KB/4.0KB] 50% 512B/s eta 6s aborted ',
      '\n',
      '\x1b[?25h',
    ]);
  });

  it('should leave the cursor alone when asked to', () => {
    const stream = new CaptureStream();
    const bar = new ProgressBar({ width: 4, hideCursor: false, stream });

    bar.update(snapshot());
    bar.end(snapshot(), 'completed');

    expect(stream.chunks.some((chunk) => chunk.includes('\x1b['))).toBe(false);
  });

  it('should draw an empty frame when started through catchDownloadProgress', () => {
    const stream = new CaptureStream();

    const bar = catchDownloadProgress({ width: 4, hideCursor: false, stream });

    expect(bar).toBeInstanceOf(ProgressBar);
    expect(stream.chunks).toEqual(['\rdownloading .       ']);
  });
});
