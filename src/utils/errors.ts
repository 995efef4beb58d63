// A series query found nothing in the requested window. Evaluators treat it
// as "condition not met".
export class NoDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoDataError";
  }
}

export class UpstreamFetchError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options);
    this.name = "UpstreamFetchError";
  }
}

export class StatePersistError extends Error {
  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`failed to persist alert state to ${filePath}`, options);
    this.name = "StatePersistError";
  }
}

export class StateCorruptError extends Error {
  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`alert state file ${filePath} is unreadable: ${detail}`, options);
    this.name = "StateCorruptError";
  }
}

export class StateLockedError extends Error {
  constructor(lockPath: string, lockedBy: string) {
    super(`alert state is locked by ${lockedBy} (${lockPath})`);
    this.name = "StateLockedError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
