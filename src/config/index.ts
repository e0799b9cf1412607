export {
  CONFIG_FILE_NAMES,
  getConfigPath,
  readPolicyDocument,
  listServerNames,
  parsePolicy,
  loadPolicy,
  createServerPolicy,
  computeEffectiveAllowed,
  isEffectAllowed,
} from "./PolicyLoader.js";
export { parseCliArgs, CLI_USAGE } from "./cliArgs.js";
export type { CliOptions, CliArgsResult } from "./cliArgs.js";
export type {
  PolicyDocument,
  ServerPolicy,
  ServerPolicyEntry,
  ServerPolicyInit,
} from "./types.js";
