/**
 * Error taxonomy shared by the gateway, the units and the RPC layer.
 * Every error carries a stable code so the supervisor and the listener can
 * branch on it without string matching.
 */

import type { ZodIssue } from "zod";

export type ErrorCode =
  | "UNAUTHORIZED"
  | "AUTH_CHAIN_EXHAUSTED"
  | "AUTHENTICATION_FAILED"
  | "UPSTREAM_REJECTED"
  | "DECODE_ERROR"
  | "UNREACHABLE"
  | "NOT_FOUND"
  | "STORE_ERROR"
  | "UNIT_UNAVAILABLE"
  | "FRAME_ERROR";

export class GatewayError extends Error {
  readonly code: ErrorCode;
  /** Critical errors make the supervisor rebuild the unit that raised them */
  readonly critical: boolean;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; critical?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.critical = options?.critical ?? false;
  }
}

/** The upstream rejected the session (HTTP 401) */
export class UnauthorizedError extends GatewayError {
  constructor(readonly operation: string) {
    super("UNAUTHORIZED", `${operation}: session rejected by upstream`);
  }
}

/** A prerequisite producer ran but left its prerequisite unset */
export class AuthChainExhaustedError extends GatewayError {
  constructor(readonly prerequisite: string, readonly operation: string) {
    super("AUTH_CHAIN_EXHAUSTED", `${operation}: prerequisite '${prerequisite}' still missing after its producer ran`);
  }
}

export class AuthenticationError extends GatewayError {
  constructor(readonly status: number) {
    super("AUTHENTICATION_FAILED", `login rejected with status ${status}`);
  }
}

export class UpstreamRejectedError extends GatewayError {
  constructor(readonly operation: string, readonly status: number) {
    super("UPSTREAM_REJECTED", `${operation}: upstream responded ${status}`);
  }
}

export class DecodeError extends GatewayError {
  constructor(readonly operation: string, detail: string, readonly issues: ZodIssue[] = []) {
    super("DECODE_ERROR", `${operation}: malformed payload (${detail})`);
  }
}

export class UnreachableError extends GatewayError {
  constructor(readonly operation: string, cause: unknown) {
    super("UNREACHABLE", `${operation}: upstream unreachable`, { cause });
  }
}

export class NotFoundError extends GatewayError {
  constructor(what: string) {
    super("NOT_FOUND", `${what} not found`);
  }
}

export class StoreError extends GatewayError {
  constructor(operation: string, cause: unknown) {
    super("STORE_ERROR", `store ${operation} failed`, { cause, critical: true });
  }
}

export class UnitUnavailableError extends GatewayError {
  constructor(readonly unit: string) {
    super("UNIT_UNAVAILABLE", `unit '${unit}' is unavailable`);
  }
}

export class FrameError extends GatewayError {
  constructor(message: string) {
    super("FRAME_ERROR", message);
  }
}

/** Anything outside the taxonomy, or explicitly critical, restarts the unit */
export function isCritical(err: unknown): boolean {
  return !(err instanceof GatewayError) || err.critical;
}

export function isUnauthorized(err: unknown): err is UnauthorizedError {
  return err instanceof GatewayError && err.code === "UNAUTHORIZED";
}

/** Failures that say something about the asset itself rather than the session or the network */
const ASSET_FAILURES: ReadonlySet<ErrorCode> = new Set(["NOT_FOUND", "UPSTREAM_REJECTED", "DECODE_ERROR"]);

export function isAssetFailure(err: unknown): err is GatewayError {
  return err instanceof GatewayError && ASSET_FAILURES.has(err.code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
