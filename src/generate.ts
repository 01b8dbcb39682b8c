import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  buildChartDescriptor,
  buildChartValues,
  loadResourceTemplates,
  renderYaml,
} from "./chart.js";
import { renderDockerfile } from "./dockerfile.js";
import { ProfileError, ProfileErrorCode } from "./errors.js";
import { logOk } from "./log.js";
import { renderNetworkPolicies, type NetworkPolicyOptions } from "./network-policy.js";
import { loadProfile, type Profile } from "./profile.js";

export const DEFAULT_OUT_DIR = "generated";

export const DOCKERFILE_PATH = "Dockerfile";
export const CHART_DIR = "helm";
export const VALUES_PATH = join(CHART_DIR, "values.yaml");

/**
 * A generated file, relative to the output directory
 */
export interface Artifact {
  path: string;
  content: string;
}

export interface GenerateOptions extends NetworkPolicyOptions {
  profilePath: string;
  outDir: string;
}

export interface GenerateResult {
  profile: Profile;
  /** Files written, joined onto outDir, in write order */
  written: string[];
}

/**
 * Render every artifact for a profile. Output depends only on the profile
 * and the options, so the same input always yields the same bytes.
 */
export async function renderArtifacts(
  profile: Profile,
  options: NetworkPolicyOptions = {}
): Promise<Artifact[]> {
  const templates = await loadResourceTemplates();
  return [
    { path: DOCKERFILE_PATH, content: renderDockerfile(profile) },
    { path: join(CHART_DIR, "Chart.yaml"), content: renderYaml(buildChartDescriptor(profile)) },
    { path: VALUES_PATH, content: renderYaml(buildChartValues(profile)) },
    { path: join(CHART_DIR, "templates", "namespace.yaml"), content: templates["namespace.yaml"] },
    { path: join(CHART_DIR, "templates", "deployment.yaml"), content: templates["deployment.yaml"] },
    { path: join(CHART_DIR, "templates", "service.yaml"), content: templates["service.yaml"] },
    {
      path: join(CHART_DIR, "templates", "networkpolicy.yaml"),
      content: renderNetworkPolicies(profile, options),
    },
  ];
}

/**
 * Write artifacts one by one, overwriting existing files. Stops at the first
 * failure; files already written are left in place.
 */
export async function writeArtifacts(artifacts: Artifact[], outDir: string): Promise<string[]> {
  const written: string[] = [];
  for (const artifact of artifacts) {
    const target = join(outDir, artifact.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, artifact.content, "utf-8");
    } catch (error) {
      throw new ProfileError(ProfileErrorCode.WRITE_FAILED, `Failed to write ${target}`, {
        path: target,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    logOk(`${artifact.path} generated -> ${target}`);
    written.push(target);
  }
  return written;
}

/**
 * Load a profile and write the Dockerfile and Helm chart for it
 */
export async function generate(options: GenerateOptions): Promise<GenerateResult> {
  const profile = await loadProfile(options.profilePath);
  const artifacts = await renderArtifacts(profile, { strictPeers: options.strictPeers });
  const written = await writeArtifacts(artifacts, options.outDir);
  return { profile, written };
}
