import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { getActiveRunLog, type RunLogLevel } from './run-log';

// Nest boot chatter is not teed, except for errors.
const IGNORED_CONTEXTS = new Set<string>([
  'NestFactory',
  'InstanceLoader',
  'NestApplication',
]);

// Writes to the run log itself; teeing it would duplicate every line.
export const RUN_LOG_CONTEXT = 'PipelineRun';

const LEVEL_ORDER: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

/** `LOG_LEVEL=debug` enables debug and everything above it. */
export function logLevelsFromEnv(raw: string | undefined): LogLevel[] {
  const wanted = (raw ?? '').trim().toLowerCase();
  const normalized = wanted === 'info' ? 'log' : wanted;
  const idx = LEVEL_ORDER.findIndex((l) => l === normalized);
  return LEVEL_ORDER.slice(idx >= 0 ? idx : LEVEL_ORDER.indexOf('log'));
}

function forward(level: RunLogLevel, message: unknown, context?: string) {
  const log = getActiveRunLog();
  if (!log) return;
  const ctx = context?.trim() ?? '';
  if (ctx === RUN_LOG_CONTEXT) return;
  if (level !== 'error' && ctx && IGNORED_CONTEXTS.has(ctx)) return;
  log.write(level, message, ctx ? { source: ctx } : null);
}

export class PipelineLogger extends ConsoleLogger {
  constructor() {
    super();
    this.setLogLevels(logLevelsFromEnv(process.env.LOG_LEVEL));
  }

  override log(message: unknown, context?: string) {
    super.log(message, context);
    if (this.isLevelEnabled('log')) forward('info', message, context);
  }

  override warn(message: unknown, context?: string) {
    super.warn(message, context);
    if (this.isLevelEnabled('warn')) forward('warn', message, context);
  }

  override error(message: unknown, stack?: string, context?: string) {
    super.error(message, stack, context);
    forward('error', stack ? `${String(message)}\n${stack}` : message, context);
  }

  override debug(message: unknown, context?: string) {
    super.debug(message, context);
    if (this.isLevelEnabled('debug')) forward('debug', message, context);
  }

  override verbose(message: unknown, context?: string) {
    super.verbose(message, context);
    if (this.isLevelEnabled('verbose')) forward('debug', message, context);
  }
}
