import { readFileSync, existsSync } from "node:fs";
import { join, extname } from "node:path";
import { load as parseYaml } from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import {
  EFFECT_LABELS,
  isEffectLabel,
  type EffectLabel,
} from "../interfaces/EffectTypes.js";
import type { ServerPolicy, ServerPolicyInit } from "./types.js";
import { logger } from "../logger.js";

/** File names looked up in the working directory when no --config is given. */
export const CONFIG_FILE_NAMES = [
  "effect-gate.yaml",
  "effect-gate.yml",
  "effect-gate.json",
] as const;

// YAML turns `PORT: 8080` into a number; the child process only takes strings.
const scalarString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const serverEntrySchema = z.object({
  command: z.string().min(1),
  args: z.array(scalarString).nullish(),
  env: z.record(z.string(), scalarString).nullish(),
  allow: z.array(z.string()).nullish(),
  deny: z.array(z.string()).nullish(),
  tool_overrides: z.record(z.string(), z.array(z.string())).nullish(),
});

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolves path to a policy file in cwd: .yaml, then .yml, then .json.
 */
export function getConfigPath(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const p = join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
}

/**
 * Reads a policy file. `.json` is parsed as JSON, anything else as YAML.
 * Returns the raw document; validation happens in parsePolicy().
 */
export function readPolicyDocument(configPath: string): unknown {
  if (!existsSync(configPath)) {
    throw new ConfigError(
      "SOURCE_MISSING",
      `Policy file not found: ${configPath}`,
    );
  }
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      "SOURCE_UNREADABLE",
      `Policy file could not be read: ${configPath}`,
      { cause: err },
    );
  }
  const isJson = extname(configPath).toLowerCase() === ".json";
  try {
    return isJson ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      "MALFORMED",
      `Policy file is not valid ${isJson ? "JSON" : "YAML"}: ${detail}`,
      { cause: err },
    );
  }
}

function requireServers(document: unknown): Record<string, unknown> {
  if (!isMapping(document)) {
    const kind =
      document === null || document === undefined
        ? "nothing"
        : Array.isArray(document)
          ? "a list"
          : `a ${typeof document}`;
    throw new ConfigError(
      "MALFORMED",
      `Policy source must contain a mapping, got ${kind}`,
    );
  }
  const servers = document.servers;
  if (!isMapping(servers)) {
    throw new ConfigError(
      "SERVERS_MISSING",
      "Policy source must contain a 'servers' mapping",
      { path: "servers" },
    );
  }
  return servers;
}

/** Server names declared under `servers`, sorted. */
export function listServerNames(document: unknown): string[] {
  return Object.keys(requireServers(document)).sort();
}

function validateEffects(
  effects: readonly string[],
  path: string,
): EffectLabel[] {
  const invalid = [...new Set(effects.filter((e) => !isEffectLabel(e)))].sort();
  if (invalid.length > 0) {
    throw new ConfigError(
      "INVALID_EFFECT",
      `Invalid effect(s) in ${path}: ${invalid.join(", ")}. Valid effects: ${EFFECT_LABELS.join(", ")}`,
      { path, invalid },
    );
  }
  return effects.filter(isEffectLabel);
}

/**
 * Builds a frozen ServerPolicy. Labels are trusted here; parsePolicy() is the
 * validating entry point for untrusted sources.
 */
export function createServerPolicy(init: ServerPolicyInit): ServerPolicy {
  const toolOverrides = new Map<string, readonly EffectLabel[]>();
  for (const [tool, effects] of Object.entries(init.toolOverrides ?? {})) {
    toolOverrides.set(tool, Object.freeze([...effects]));
  }
  return Object.freeze({
    name: init.name,
    command: init.command,
    args: Object.freeze([...(init.args ?? [])]),
    ...(init.env != null && { env: Object.freeze({ ...init.env }) }),
    allow: new Set(init.allow ?? []),
    deny: new Set(init.deny ?? []),
    toolOverrides,
  });
}

/**
 * Validates a parsed policy document and returns the policy for `serverName`.
 * Throws ConfigError naming the field path on the first failure found.
 */
export function parsePolicy(document: unknown, serverName: string): ServerPolicy {
  const servers = requireServers(document);
  if (!Object.hasOwn(servers, serverName)) {
    throw new ConfigError(
      "SERVER_NOT_FOUND",
      `Server '${serverName}' not found in policy. Available: ${Object.keys(servers).sort().join(", ") || "(none)"}`,
      { path: `servers.${serverName}` },
    );
  }

  const base = `servers.${serverName}`;
  const cfg = servers[serverName];
  if (!isMapping(cfg)) {
    throw new ConfigError("MALFORMED", `${base} must be a mapping`, {
      path: base,
    });
  }
  if (cfg.command == null || cfg.command === "") {
    throw new ConfigError(
      "COMMAND_MISSING",
      `Server '${serverName}' is missing required 'command' field`,
      { path: `${base}.command` },
    );
  }

  const parsed = serverEntrySchema.safeParse(cfg);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = [base, ...issue.path.map(String)].join(".");
    throw new ConfigError("MALFORMED", `Invalid ${path}: ${issue.message}`, {
      path,
    });
  }
  const entry = parsed.data;

  const allow = validateEffects(entry.allow ?? [], `${base}.allow`);
  const deny = validateEffects(entry.deny ?? [], `${base}.deny`);
  const toolOverrides: Record<string, EffectLabel[]> = {};
  for (const [tool, effects] of Object.entries(entry.tool_overrides ?? {})) {
    toolOverrides[tool] = validateEffects(
      effects,
      `${base}.tool_overrides.${tool}`,
    );
  }

  return createServerPolicy({
    name: serverName,
    command: entry.command,
    args: entry.args ?? [],
    ...(entry.env != null && { env: entry.env }),
    allow,
    deny,
    toolOverrides,
  });
}

/**
 * Loads the policy for `serverName` from a YAML or JSON file.
 */
export function loadPolicy(configPath: string, serverName: string): ServerPolicy {
  logger.debug({ configPath, server: serverName }, "Loading policy");
  const policy = parsePolicy(readPolicyDocument(configPath), serverName);
  logger.debug(
    {
      server: policy.name,
      allow: [...policy.allow],
      deny: [...policy.deny],
      overrides: policy.toolOverrides.size,
    },
    "Policy loaded",
  );
  return policy;
}

/**
 * Effects a tool may have under this policy: `allow` (or the whole vocabulary when
 * `allow` is empty) minus `deny`. Deny wins, including for labels listed in both.
 */
export function computeEffectiveAllowed(
  policy: Pick<ServerPolicy, "allow" | "deny">,
): ReadonlySet<EffectLabel> {
  const base: ReadonlySet<EffectLabel> =
    policy.allow.size > 0 ? policy.allow : new Set(EFFECT_LABELS);
  return new Set(EFFECT_LABELS.filter((l) => base.has(l) && !policy.deny.has(l)));
}

export function isEffectAllowed(
  policy: Pick<ServerPolicy, "allow" | "deny">,
  label: EffectLabel,
): boolean {
  return computeEffectiveAllowed(policy).has(label);
}
