import fs from 'node:fs';
import path from 'node:path';

/**
 * Per-job destination for sanitized output and lifecycle markers.
 * The scheduler writes to it and closes it once the job is terminal;
 * where the lines end up is the caller's business.
 */
export interface LogSink {
  write(line: string): void;
  close(): void;
}

export class FileLogSink implements LogSink {
  readonly path: string;
  private stream: fs.WriteStream | null = null;
  private failed = false;

  constructor(filePath: string) {
    this.path = filePath;
  }

  write(line: string) {
    if (this.failed) return;
    this.open().write(line + '\n');
  }

  close() {
    this.stream?.end();
    this.stream = null;
  }

  private open(): fs.WriteStream {
    if (this.stream) return this.stream;
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    const stream = fs.createWriteStream(this.path, { flags: 'a', encoding: 'utf8' });
    stream.on('error', (err) => {
      this.failed = true;
      console.error(`[log] failed to write ${path.basename(this.path)}: ${err.message}`);
    });
    this.stream = stream;
    return stream;
  }
}

export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];
  closed = false;

  write(line: string) {
    if (this.closed) return;
    this.lines.push(line);
  }

  close() {
    this.closed = true;
  }
}
