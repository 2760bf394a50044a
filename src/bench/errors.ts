import type { ZodError } from "zod";
import type { BackendId, Phase, RecordId } from "./types.ts";

export type BenchErrorCode =
  | "CONFIGURATION"
  | "CONNECTION"
  | "INVALID_SIZE"
  | "INVALID_REPEAT_COUNT"
  | "NOT_FOUND";

export class BenchError extends Error {
  readonly code: BenchErrorCode;

  constructor(code: BenchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BenchError";
    this.code = code;
  }
}

export class ConfigurationError extends BenchError {
  readonly zodError: ZodError | null;

  constructor(message: string, zodError?: ZodError | null) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
    this.zodError = zodError ?? null;
  }
}

export class ConnectionError extends BenchError {
  readonly backend: BackendId;

  constructor(backend: BackendId, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("CONNECTION", `${backend}: connection failed: ${reason}`, { cause });
    this.name = "ConnectionError";
    this.backend = backend;
  }
}

export class InvalidSizeError extends BenchError {
  constructor(size: number) {
    super("INVALID_SIZE", `dataset size must be a positive integer, got ${size}`);
    this.name = "InvalidSizeError";
  }
}

export class InvalidRepeatCountError extends BenchError {
  constructor(repeats: number) {
    super("INVALID_REPEAT_COUNT", `repeat count must be a positive integer, got ${repeats}`);
    this.name = "InvalidRepeatCountError";
  }
}

export class NotFoundError extends BenchError {
  readonly backend: BackendId;
  readonly phase: Phase;
  readonly id: RecordId;

  constructor(backend: BackendId, phase: Phase, id: RecordId) {
    super("NOT_FOUND", `${backend}: record ${id} not found during ${phase}`);
    this.name = "NotFoundError";
    this.backend = backend;
    this.phase = phase;
    this.id = id;
  }
}
