import { inspect } from 'node:util';
import { errToMessage } from '../errors';
import { nodeFsOps, type FsOps } from '../runs/fs-ops';

export type RunLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

const MAX_MESSAGE_CHARS = 10_000;

export function normalizeLogMessage(input: unknown): string {
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (
    typeof input === 'number' ||
    typeof input === 'boolean' ||
    typeof input === 'bigint'
  ) {
    return String(input);
  }
  if (typeof input === 'symbol') {
    return input.description ? `Symbol(${input.description})` : 'Symbol()';
  }
  try {
    const json = JSON.stringify(input);
    return typeof json === 'string'
      ? json
      : inspect(input, { depth: 6, maxArrayLength: 50 });
  } catch {
    // circular references
    return inspect(input, { depth: 6, maxArrayLength: 50 });
  }
}

export function formatRunLogLine(params: {
  time: Date;
  level: RunLogLevel;
  message: string;
  context?: JsonObject | null;
}): string {
  const msg =
    params.message.length > MAX_MESSAGE_CHARS
      ? `${params.message.slice(0, MAX_MESSAGE_CHARS)}…`
      : params.message;
  // One entry per line; stack traces are folded.
  const flat = msg.replace(/\r?\n/g, ' | ');
  const ctx =
    params.context && Object.keys(params.context).length
      ? ` ${JSON.stringify(params.context)}`
      : '';
  return `${params.time.toISOString()} [${params.level}] ${flat}${ctx}`;
}

/**
 * `runner.log` for one run directory. Lines are appended in order through a
 * single write chain; `flush()` waits for everything queued so far.
 */
export class RunLog {
  private writeChain: Promise<void> = Promise.resolve();
  private failedWrites = 0;
  private lastWriteError: string | null = null;

  constructor(
    readonly path: string,
    private readonly fs: FsOps = nodeFsOps,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  write(level: RunLogLevel, message: unknown, context?: JsonObject | null) {
    const line = formatRunLogLine({
      time: this.clock(),
      level,
      message: normalizeLogMessage(message).trim(),
      context,
    });
    this.writeChain = this.writeChain
      .then(() => this.fs.appendFile(this.path, `${line}\n`, 'utf8'))
      .catch((err: unknown) => {
        this.failedWrites += 1;
        this.lastWriteError = errToMessage(err);
      });
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  getWriteFailures(): { count: number; lastError: string | null } {
    return { count: this.failedWrites, lastError: this.lastWriteError };
  }
}

// Only one run is active per process (the pipeline is single-flight).
let activeRunLog: RunLog | null = null;

export function attachRunLog(log: RunLog) {
  activeRunLog = log;
}

export function detachRunLog(log: RunLog) {
  if (activeRunLog === log) activeRunLog = null;
}

export function getActiveRunLog(): RunLog | null {
  return activeRunLog;
}
