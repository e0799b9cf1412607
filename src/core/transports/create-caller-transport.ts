import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Creates the caller-facing transport: this process's own stdin/stdout.
 */
export function createCallerTransport(): StdioServerTransport {
  return new StdioServerTransport();
}
