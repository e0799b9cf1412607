#!/usr/bin/env node
/**
 * CLI – parse argv, load the policy for one server, run the firewall relay on stdio.
 * Exits non-zero before any proxying if the policy cannot be loaded or the backend
 * cannot be reached.
 */
import { resolve } from "node:path";
import { SessionRelay } from "./core/SessionRelay.js";
import { EffectGateError } from "./core/errors.js";
import {
  CLI_USAGE,
  computeEffectiveAllowed,
  getConfigPath,
  listServerNames,
  parseCliArgs,
  parsePolicy,
  readPolicyDocument,
} from "./config/index.js";
import { logger } from "./logger.js";

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    logger.error(parsed.error);
    process.stderr.write(CLI_USAGE);
    process.exitCode = 2;
    return;
  }
  const options = parsed.options;
  if (options.help) {
    process.stderr.write(CLI_USAGE);
    return;
  }
  if (options.verbose) logger.level = "debug";
  logger.debug({ argv: process.argv }, "CLI starting");

  const configPath = options.configPath
    ? resolve(options.configPath)
    : getConfigPath(process.cwd());
  if (!configPath) {
    logger.error(
      "No policy file found. Use --config policy.yaml or add effect-gate.yaml in cwd.",
    );
    process.exitCode = 1;
    return;
  }

  logger.info({ configPath }, "Loading policy");
  const document = readPolicyDocument(configPath);
  let serverName = options.serverName;
  if (!serverName) {
    const names = listServerNames(document);
    if (names.length !== 1) {
      logger.error(
        { available: names },
        "Use --server to choose a server entry from the policy file.",
      );
      process.exitCode = 1;
      return;
    }
    serverName = names[0];
  }
  const policy = parsePolicy(document, serverName);

  if (options.check) {
    logger.info(
      {
        server: policy.name,
        command: policy.command,
        allowedEffects: [...computeEffectiveAllowed(policy)],
        overrides: Object.fromEntries(policy.toolOverrides),
      },
      "Policy is valid",
    );
    return;
  }

  const relay = new SessionRelay({ policy });
  const shutdown = (): void => {
    logger.info("Signal received; closing relay");
    void relay.close();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await relay.start();
  await relay.closed;
  process.off("SIGINT", shutdown);
  process.off("SIGTERM", shutdown);
  // Both sessions are closed; the process exits once the log stream drains.
}

main().catch((err: unknown) => {
  if (err instanceof EffectGateError) {
    logger.error({ code: err.code, err: err.cause }, err.message);
  } else {
    logger.error({ err }, "effect-gate failed to start");
  }
  process.exitCode = 1;
});
