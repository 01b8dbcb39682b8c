import { DEFAULT_OUT_DIR } from "./generate.js";
import { DEFAULT_PROFILE_PATH } from "./profile.js";

/**
 * Runtime configuration shared by the generate and deploy commands
 */
export interface Config {
  profilePath: string;
  outDir: string;
  strictPeers: boolean;
  /** Registry account; prompted for when unset and interactive */
  username?: string;
  /** Skip the confirmation prompt */
  assumeYes: boolean;
  /** Use the current kubectl context instead of starting minikube */
  skipMinikube: boolean;
  interactive: boolean;
  /** Pause after tearing down the previous release */
  settleDelayMs: number;
  /** Pause after helm install before waiting on the pod */
  readyDelayMs: number;
}

export type ConfigOverrides = Partial<Config>;

function envFlag(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

/**
 * Whether we are running in CI
 */
export function isCI(env: NodeJS.ProcessEnv = process.env): boolean {
  return envFlag(env.CI);
}

/**
 * Merge defaults, environment and explicit overrides, in that order
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Config {
  const ci = isCI(env);
  const defaults: Config = {
    profilePath: env.KUBEPROFILE_PROFILE || DEFAULT_PROFILE_PATH,
    outDir: env.KUBEPROFILE_OUT_DIR || DEFAULT_OUT_DIR,
    strictPeers: envFlag(env.KUBEPROFILE_STRICT_PEERS),
    username: env.DOCKERHUB_USERNAME || undefined,
    assumeYes: ci,
    skipMinikube: false,
    interactive: !ci,
    settleDelayMs: 3000,
    readyDelayMs: 10000,
  };

  return {
    profilePath: overrides.profilePath ?? defaults.profilePath,
    outDir: overrides.outDir ?? defaults.outDir,
    strictPeers: overrides.strictPeers ?? defaults.strictPeers,
    username: overrides.username ?? defaults.username,
    assumeYes: overrides.assumeYes ?? defaults.assumeYes,
    skipMinikube: overrides.skipMinikube ?? defaults.skipMinikube,
    interactive: overrides.interactive ?? defaults.interactive,
    settleDelayMs: overrides.settleDelayMs ?? defaults.settleDelayMs,
    readyDelayMs: overrides.readyDelayMs ?? defaults.readyDelayMs,
  };
}
