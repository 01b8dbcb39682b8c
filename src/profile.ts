import { readFile } from "node:fs/promises";
import { parse, YAMLParseError } from "yaml";
import { ProfileError, ProfileErrorCode } from "./errors.js";

export const DEFAULT_PROFILE_PATH = "profile.yaml";

/**
 * Keeps the container alive without running a service
 */
export const KEEP_ALIVE_COMMAND: readonly string[] = [
  "/bin/sh",
  "-c",
  "while true; do sleep 3600; done",
];

export type Direction = "ingress" | "egress";

export interface NetworkRule {
  direction: Direction;
  protocol: string;
  port: number | string;
  /** `from.namespace` for ingress, `to.namespace` for egress; undefined when omitted */
  peerNamespace?: string;
  /** Dotted path of the peer namespace field, for error reporting */
  peerPath: string;
}

type YamlMap = Record<string, unknown>;

// The failsafe schema hands every scalar over as a string, nulls and booleans included
const NULL_VALUES = new Set(["", "~", "null", "Null", "NULL"]);
const TRUE_VALUES = new Set(["true", "True", "TRUE", "yes", "Yes", "YES", "on", "On", "ON"]);
const FALSE_VALUES = new Set(["false", "False", "FALSE", "no", "No", "NO", "off", "Off", "OFF"]);

function isMap(value: unknown): value is YamlMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && NULL_VALUES.has(value));
}

/**
 * Walk a dotted path, returning undefined as soon as a segment is missing
 */
function lookup(root: unknown, segments: readonly string[]): unknown {
  let current = root;
  for (const segment of segments) {
    if (!isMap(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function missing(path: string): ProfileError {
  return new ProfileError(ProfileErrorCode.MISSING_FIELD, `Profile is missing required field "${path}"`, {
    field: path,
  });
}

function invalid(path: string, expected: string, value: unknown): ProfileError {
  return new ProfileError(
    ProfileErrorCode.INVALID_FIELD,
    `Profile field "${path}" must be ${expected}, got ${JSON.stringify(value)}`,
    { field: path }
  );
}

function toText(value: unknown, path: string): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  throw invalid(path, "a scalar", value);
}

function requireText(node: unknown, segments: readonly string[], path: string): string {
  const value = lookup(node, segments);
  if (isAbsent(value)) {
    throw missing(path);
  }
  return toText(value, path);
}

function optionalFlag(node: unknown, segments: readonly string[], path: string): boolean {
  const value = lookup(node, segments);
  if (isAbsent(value)) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string" && TRUE_VALUES.has(value)) {
    return true;
  }
  if (typeof value === "string" && FALSE_VALUES.has(value)) {
    return false;
  }
  throw invalid(path, "a boolean", value);
}

function textList(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw invalid(path, "a list", value);
  }
  return value.map((item, i) => toText(item, `${path}[${i}]`));
}

function toPort(value: unknown, path: string): number | string {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^[0-9]+$/.test(value)) {
    return Number(value);
  }
  if (typeof value === "string" && value.length > 0) {
    // Named container port
    return value;
  }
  throw invalid(path, "a port number or name", value);
}

function toRule(raw: unknown, index: number): NetworkRule {
  const base = `network.rules[${index}]`;
  if (!isMap(raw)) {
    throw invalid(base, "a mapping", raw);
  }

  const direction = requireText(raw, ["direction"], `${base}.direction`);
  if (direction !== "ingress" && direction !== "egress") {
    throw invalid(`${base}.direction`, '"ingress" or "egress"', direction);
  }

  const peerKey = direction === "ingress" ? "from" : "to";
  const peerPath = `${base}.${peerKey}.namespace`;
  const peer = lookup(raw, [peerKey, "namespace"]);

  const port = lookup(raw, ["port"]);
  if (isAbsent(port)) {
    throw missing(`${base}.port`);
  }

  return {
    direction,
    protocol: requireText(raw, ["protocol"], `${base}.protocol`),
    port: toPort(port, `${base}.port`),
    peerNamespace: isAbsent(peer) ? undefined : toText(peer, peerPath),
    peerPath,
  };
}

/**
 * A parsed profile document.
 *
 * Fields are read on access: there is no up-front schema pass, so a missing
 * required field surfaces as a MISSING_FIELD error the first time a
 * generator asks for it.
 */
export class Profile {
  private readonly raw: YamlMap;
  readonly source: string;

  constructor(raw: YamlMap, source = "<inline>") {
    this.raw = raw;
    this.source = source;
  }

  static fromObject(raw: unknown, source?: string): Profile {
    if (!isMap(raw)) {
      throw new ProfileError(ProfileErrorCode.PROFILE_MALFORMED, "Profile root must be a mapping", {
        source,
      });
    }
    return new Profile(raw, source);
  }

  /**
   * Parse YAML text. Scalars keep their source spelling ("20.10" stays
   * "20.10"), the typed accessors below convert ports and flags.
   */
  static fromYaml(text: string, source?: string): Profile {
    let raw: unknown;
    try {
      raw = parse(text, { schema: "failsafe" });
    } catch (error) {
      if (error instanceof YAMLParseError) {
        throw new ProfileError(
          ProfileErrorCode.PROFILE_MALFORMED,
          `Profile ${source ?? "<inline>"} is not valid YAML: ${error.message}`,
          { source, line: error.linePos?.[0].line }
        );
      }
      throw error;
    }
    return Profile.fromObject(raw, source);
  }

  get name(): string {
    return requireText(this.raw, ["profile", "name"], "profile.name");
  }

  get version(): string {
    return requireText(this.raw, ["profile", "version"], "profile.version");
  }

  get distro(): string {
    return requireText(this.raw, ["os", "distro"], "os.distro");
  }

  get osVersion(): string {
    return requireText(this.raw, ["os", "version"], "os.version");
  }

  get packages(): string[] {
    const value = this.raw.packages;
    if (isAbsent(value)) {
      throw missing("packages");
    }
    return textList(value, "packages");
  }

  get command(): string[] {
    const value = this.raw.command;
    if (isAbsent(value)) {
      return [...KEEP_ALIVE_COMMAND];
    }
    const command = textList(value, "command");
    if (command.length === 0) {
      throw invalid("command", "a non-empty list", value);
    }
    return command;
  }

  get rules(): NetworkRule[] {
    const network = this.network();
    const rules = network.rules;
    if (isAbsent(rules)) {
      return [];
    }
    if (!Array.isArray(rules)) {
      throw invalid("network.rules", "a list", rules);
    }
    return rules.map(toRule);
  }

  get defaultDenyIngress(): boolean {
    return optionalFlag(this.network(), ["default_deny_ingress"], "network.default_deny_ingress");
  }

  get defaultDenyEgress(): boolean {
    return optionalFlag(this.network(), ["default_deny_egress"], "network.default_deny_egress");
  }

  private network(): YamlMap {
    const network = this.raw.network;
    if (isAbsent(network)) {
      throw missing("network");
    }
    if (!isMap(network)) {
      throw invalid("network", "a mapping", network);
    }
    return network;
  }
}

/**
 * Read and parse a profile document
 */
export async function loadProfile(path: string = DEFAULT_PROFILE_PATH): Promise<Profile> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const notFound = isMap(error) && error.code === "ENOENT";
    throw new ProfileError(
      notFound ? ProfileErrorCode.PROFILE_NOT_FOUND : ProfileErrorCode.PROFILE_UNREADABLE,
      notFound ? `Profile not found: ${path}` : `Cannot read profile ${path}`,
      { path, cause: error instanceof Error ? error.message : String(error) }
    );
  }
  return Profile.fromYaml(text, path);
}
