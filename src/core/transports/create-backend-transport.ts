import {
  StdioClientTransport,
  getDefaultEnvironment,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import type { ServerPolicy } from "../../config/types.js";
import { logger } from "../../logger.js";

/**
 * Child-process environment: the SDK's default safe subset of our own environment,
 * with the policy's `env` entries layered on top.
 */
export function buildBackendEnvironment(
  policy: Pick<ServerPolicy, "env">,
  defaults: Record<string, string> = getDefaultEnvironment(),
): Record<string, string> {
  return { ...defaults, ...policy.env };
}

/**
 * Creates the stdio transport that launches the backend MCP server. The process is
 * spawned when the transport starts (Client.connect), not here. The backend's stderr
 * passes through to ours so its diagnostics end up beside the relay's logs.
 */
export function createBackendTransport(
  policy: ServerPolicy,
): StdioClientTransport {
  logger.debug(
    { command: policy.command, args: policy.args, server: policy.name },
    "Creating backend stdio transport",
  );
  return new StdioClientTransport({
    command: policy.command,
    args: [...policy.args],
    env: buildBackendEnvironment(policy),
    stderr: "inherit",
  });
}
