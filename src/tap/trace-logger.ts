import { createWriteStream, mkdirSync, WriteStream } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { config } from '../config.js';

export interface TraceOptions {
  enabled?: boolean;
  dir?: string;
}

/**
 * Lightweight trace logger that records ADQL sent to the TAP service and the
 * outcome of each query when EXO_TRACE is set.
 */
export class TapTraceLogger {
  private stream: WriteStream | null = null;

  constructor(private readonly context: string, options: TraceOptions = {}) {
    const enabled = options.enabled ?? config.trace.enabled;
    if (!enabled) {
      return;
    }

    const dir = options.dir ?? config.trace.dir ?? join(process.cwd(), 'logs');
    mkdirSync(dir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const id = randomUUID().split('-')[0];
    const filePath = join(dir, `tap-trace-${context}-${timestamp}-${id}.log`);
    this.stream = createWriteStream(filePath, { flags: 'a' });
    this.stream.write(`# Trace start ${new Date().toISOString()} (${context})\n`);
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  logQuery(adql: string): void {
    this.write('SEND', JSON.stringify(adql));
  }

  logRows(count: number, elapsedMs: number): void {
    this.write('RECV', `${count} row(s) in ${elapsedMs}ms`);
  }

  logError(error: unknown): void {
    const msg = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.write('ERROR', msg);
  }

  close(): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`# Trace end ${new Date().toISOString()}\n`);
    this.stream.end();
    this.stream = null;
  }

  private write(type: 'SEND' | 'RECV' | 'ERROR', payload: string): void {
    if (!this.stream) {
      return;
    }
    const stamp = new Date().toISOString();
    this.stream.write(`[${stamp}] [${this.context}] ${type}: ${payload}\n`);
  }
}
