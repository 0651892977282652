// ─── Pipeline Error Taxonomy ─────────────────────────────────────────────────
// Every class here is fatal for a run. Field-level data problems never throw;
// they become nulls in the normalizer.

/**
 * Neither the live source nor the fallback produced a payload.
 */
export class ExtractionFailedError extends Error {
  constructor(
    message: string,
    public readonly liveError: unknown,
    public readonly fallbackError: unknown,
  ) {
    super(message, { cause: fallbackError });
    this.name = 'ExtractionFailedError';
  }
}

/**
 * The committed fallback payload is missing or is not a JSON array of records.
 */
export class FallbackUnavailableError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FallbackUnavailableError';
  }
}

export class PersistenceFailedError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PersistenceFailedError';
  }
}

export class MalformedSnapshotError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MalformedSnapshotError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
