export function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | null {
  if (!err || typeof err !== 'object' || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

/**
 * Failures that must abort the invocation. Everything else is degraded and
 * handled at the stage boundary.
 */
export class PipelineFatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RunDirectoryError extends PipelineFatalError {}

export class LatestPointerError extends PipelineFatalError {}
