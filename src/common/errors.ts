import { isRecord } from './types';

/**
 * Base class for every failure the harness reports
 * None of these are recovered locally; the scenario runner maps them to a non-zero exit
 */
export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Fixture file missing, unreadable, or not shaped like a fixture
 */
export class FixtureError extends HarnessError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Fixture ${path}: ${message}`, options);
  }
}

/**
 * A session that breaks the start/epoch/write/sync ordering, or mixes payload formats
 */
export class ProtocolSequenceError extends HarnessError {}

/**
 * Response stream ended early or faulted while a response was still owed
 */
export class StreamCorrelationError extends HarnessError {
  constructor(
    readonly requestIndex: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Rows read back from a store differ from the rows the fixture describes
 */
export class ResultMismatchError extends HarnessError {}

// fs errors can come from another realm (as under Jest), so nothing here relies on instanceof Error
export function errorMessage(error: unknown): string {
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isRecord(error) && error.code === code;
}
