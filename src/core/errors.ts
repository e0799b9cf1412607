export type ConfigErrorCode =
  | "SOURCE_MISSING"
  | "SOURCE_UNREADABLE"
  | "MALFORMED"
  | "SERVERS_MISSING"
  | "SERVER_NOT_FOUND"
  | "COMMAND_MISSING"
  | "INVALID_EFFECT";

/** Base class for failures the relay reports to its operator. */
export class EffectGateError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EffectGateError";
    this.code = code;
  }
}

/**
 * Policy could not be loaded. Fatal at startup: the relay never establishes a session
 * with a policy it could not read in full.
 */
export class ConfigError extends EffectGateError {
  declare readonly code: ConfigErrorCode;
  /** Dotted field path inside the policy source, when the failure has one. */
  readonly path?: string;
  /** Offending labels for INVALID_EFFECT. */
  readonly invalid?: readonly string[];

  constructor(
    code: ConfigErrorCode,
    message: string,
    details: { path?: string; invalid?: readonly string[]; cause?: unknown } = {},
  ) {
    super(code, message, { cause: details.cause });
    this.name = "ConfigError";
    this.path = details.path;
    this.invalid = details.invalid;
  }
}

/** Backend could not be launched or did not complete the protocol handshake. */
export class BackendUnavailableError extends EffectGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_UNAVAILABLE", message, options);
    this.name = "BackendUnavailableError";
  }
}
