import { readFile } from "node:fs/promises";
import { stringify } from "yaml";
import type { Profile } from "./profile.js";

/**
 * Stands in for the registry account in `image.repository` until
 * {@link bindRegistry} replaces it
 */
export const REGISTRY_PLACEHOLDER = "YOUR_DOCKERHUB_USERNAME";

export type PullPolicy = "Always" | "IfNotPresent" | "Never";
export type ServiceType = "ClusterIP" | "NodePort" | "LoadBalancer";

/**
 * Chart.yaml
 */
export interface ChartDescriptor {
  apiVersion: "v2";
  name: string;
  description: string;
  type: "application";
  version: string;
  appVersion: string;
}

/**
 * values.yaml
 */
export interface ChartValues {
  replicaCount: number;
  image: {
    repository: string;
    tag: string;
    pullPolicy: PullPolicy;
  };
  namespace: string;
  service: {
    type: ServiceType;
    port: number;
  };
  app: {
    name: string;
  };
  command: string[];
}

export const RESOURCE_TEMPLATES = ["namespace.yaml", "deployment.yaml", "service.yaml"] as const;

export type ResourceTemplate = (typeof RESOURCE_TEMPLATES)[number];

const TEMPLATE_DIR = new URL("../chart-templates/", import.meta.url);

/**
 * Image tag in the form distro-name-vversion
 */
export function imageTag(profile: Profile): string {
  return `${profile.distro}-${profile.name}-v${profile.version}`;
}

export function buildChartDescriptor(profile: Profile): ChartDescriptor {
  const name = profile.name;
  const version = profile.version;
  return {
    apiVersion: "v2",
    name,
    description: `Auto-generated chart for profile ${name}`,
    type: "application",
    version,
    appVersion: version,
  };
}

export function buildChartValues(profile: Profile): ChartValues {
  const name = profile.name;
  return {
    replicaCount: 1,
    image: {
      repository: `${REGISTRY_PLACEHOLDER}/${name}`,
      tag: imageTag(profile),
      pullPolicy: "IfNotPresent",
    },
    namespace: name,
    service: {
      type: "ClusterIP",
      port: 80,
    },
    app: {
      name,
    },
    command: profile.command,
  };
}

/**
 * Serialize a document without line folding, so long commands stay on one line
 */
export function renderYaml(value: unknown): string {
  return stringify(value, { lineWidth: 0 });
}

/**
 * Load the static namespace, deployment and service templates. Every
 * resource-specific field in them is a .Values reference resolved by helm.
 */
export async function loadResourceTemplates(): Promise<Record<ResourceTemplate, string>> {
  const [namespace, deployment, service] = await Promise.all(
    RESOURCE_TEMPLATES.map((file) => readFile(new URL(file, TEMPLATE_DIR), "utf-8"))
  );
  return {
    "namespace.yaml": namespace,
    "deployment.yaml": deployment,
    "service.yaml": service,
  };
}
