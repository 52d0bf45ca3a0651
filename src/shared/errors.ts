import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  CONFIG_ERROR: 3,
  UPSTREAM_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

export type LiveErrorCode =
  | "SESSION_ACTIVE"
  | "CONFIG"
  | "CONNECT"
  | "PROTOCOL"
  | "API"
  | "TRANSPORT";

/** Base class for every failure raised by the live client. */
export class LiveError extends Error {
  constructor(
    message: string,
    readonly code: LiveErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LiveError";
  }
}

/** Missing identity code or credentials. Raised before any session exists. */
export class ConfigError extends LiveError {
  constructor(message: string) {
    super(message, "CONFIG");
    this.name = "ConfigError";
  }
}

/** Socket handshake failure. */
export class ConnectError extends LiveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONNECT", options);
    this.name = "ConnectError";
  }
}

/** Malformed frame or undecodable payload. The offending chunk is skipped. */
export class ProtocolError extends LiveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PROTOCOL", options);
    this.name = "ProtocolError";
  }
}

/** Upstream REST failure: non-zero response code, bad HTTP status or unreachable host. */
export class ApiError extends LiveError {
  readonly apiCode: number | undefined;
  readonly status: number | undefined;

  constructor(
    message: string,
    details: { apiCode?: number; status?: number; cause?: unknown } = {}
  ) {
    super(message, "API", { cause: details.cause });
    this.name = "ApiError";
    this.apiCode = details.apiCode;
    this.status = details.status;
  }
}

/** Socket read/write failure. Ends the session loop. */
export class TransportError extends LiveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSPORT", options);
    this.name = "TransportError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) return EXIT.CONFIG_ERROR;
  if (error instanceof LiveError) {
    return error.code === "SESSION_ACTIVE" ? EXIT.GENERIC_ERROR : EXIT.UPSTREAM_FAILURE;
  }
  return EXIT.GENERIC_ERROR;
}
