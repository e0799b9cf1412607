export { SessionRelay, mirrorCapabilities } from "./SessionRelay.js";
export {
  buildAllowedTools,
  buildBlockedResult,
  disallowedEffects,
  isAllowed,
} from "./ToolGate.js";
export type { ToolGateResult } from "./ToolGate.js";
export { AllowedNameCache } from "./AllowedNameCache.js";
export type { CatalogSnapshot } from "./AllowedNameCache.js";
export {
  EffectGateError,
  ConfigError,
  BackendUnavailableError,
} from "./errors.js";
export type { ConfigErrorCode } from "./errors.js";
export { GateAction, BLOCKED_META_KEY } from "./types.js";
export type {
  RelayState,
  RelayTransports,
  SessionRelayConfig,
  BlockedCallMeta,
  GateActionName,
} from "./types.js";
