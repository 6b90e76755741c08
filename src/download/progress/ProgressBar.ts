/**
 * ProgressBar - terminal rendering of download progress
 *
 * A ProgressSink: hand it to a download through `progressSinks` and the
 * reporter drives it, including the final `end()` on every exit path.
 */

import { ProgressEndStatus, ProgressSink, ProgressSnapshot } from '../core/types';

const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

export interface ProgressBarOptions {
  /** Width of the bar itself, in characters */
  width?: number;
  prefix?: string;
  stream?: NodeJS.WritableStream;
  hideCursor?: boolean;
  fill?: string;
  empty?: string;
}

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value}B` : `${value.toFixed(1)}${UNITS[unit]}`;
}

export function formatDuration(seconds: number): string {
  const total = Math.ceil(seconds);
  if (total < 60) {
    return `${total}s`;
  }
  const minutes = Math.floor(total / 60);
  if (minutes < 60) {
    return `${minutes}m${String(total % 60).padStart(2, '0')}s`;
  }
  return `${Math.floor(minutes / 60)}h${String(minutes % 60).padStart(2, '0')}m`;
}

export class ProgressBar implements ProgressSink {
  private readonly width: number;
  private readonly prefix: string;
  private readonly stream: NodeJS.WritableStream;
  private readonly hideCursor: boolean;
  private readonly fill: string;
  private readonly empty: string;
  private cursorHidden = false;
  private ended = false;
  private frame = 0;

  constructor(options: ProgressBarOptions = {}) {
    this.width = options.width ?? 32;
    this.prefix = options.prefix ?? 'downloading';
    this.stream = options.stream ?? process.stdout;
    this.hideCursor = options.hideCursor ?? true;
    // Single characters only, the width math assumes it
    this.fill = options.fill ?? '█';
    this.empty = options.empty ?? ' ';
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Draw an empty bar before the first byte arrives
   */
  start(): void {
    this.draw(null);
  }

  update(snapshot: ProgressSnapshot): void {
    this.draw(snapshot);
  }

  end(snapshot: ProgressSnapshot, status: ProgressEndStatus): void {
    if (this.ended) {
      return;
    }
    this.draw(snapshot, status === 'aborted' ? ' aborted' : '');
    this.ended = true;
    this.stream.write('\n');
    this.setCursorVisible(true);
  }

  /**
   * Line for a snapshot, without carriage return or cursor codes
   */
  render(snapshot: ProgressSnapshot | null): string {
    const bar = snapshot && snapshot.percentage !== null ? this.renderBar(snapshot.percentage) : this.renderSpinner();
    return `${this.prefix}${bar}${snapshot ? this.renderSuffix(snapshot) : ''}`;
  }

  private renderBar(percentage: number): string {
    const filled = Math.floor((percentage / 100) * this.width);
    return ` |${this.fill.repeat(filled)}${this.empty.repeat(this.width - filled)}| `;
  }

  // Unknown total: cycling dots padded to the bar's width
  private renderSpinner(): string {
    const dots = '.'.repeat((this.frame % 3) + 1);
    return ` ${dots}`.padEnd(this.width + 4);
  }

  private renderSuffix(snapshot: ProgressSnapshot): string {
    const parts: string[] = [];
    const transferred = formatBytes(snapshot.bytesTransferred);
    parts.push(
      snapshot.totalBytes !== null
        ? `[${transferred}/${formatBytes(snapshot.totalBytes)}]`
        : `[${transferred}]`,
    );
    if (snapshot.percentage !== null) {
      parts.push(`${Math.floor(snapshot.percentage)}%`);
    }
    parts.push(`${formatBytes(Math.round(snapshot.rate))}/s`);
    if (snapshot.etaSeconds !== null) {
      parts.push(`eta ${formatDuration(snapshot.etaSeconds)}`);
    }
    return parts.join(' ');
  }

  private draw(snapshot: ProgressSnapshot | null, trailer: string = ''): void {
    if (this.ended) {
      return;
    }
    if (this.hideCursor) {
      this.setCursorVisible(false);
    }
    this.stream.write(`\r${this.render(snapshot)}${trailer} `);
    this.frame++;
  }

  private setCursorVisible(visible: boolean): void {
    if (visible && this.cursorHidden) {
      this.stream.write(SHOW_CURSOR);
      this.cursorHidden = false;
    } else if (!visible && !this.cursorHidden) {
      this.stream.write(HIDE_CURSOR);
      this.cursorHidden = true;
    }
  }
}

/**
 * Create and start a progress bar, ready to be passed as a progress sink.
 * Keep other output off the stream until the download returns.
 */
export function catchDownloadProgress(options: ProgressBarOptions = {}): ProgressBar {
  const bar = new ProgressBar(options);
  bar.start();
  return bar;
}
