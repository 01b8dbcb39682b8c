import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { confirm, input } from "@inquirer/prompts";
import type { Config } from "./config.js";
import { DeployError, DeployErrorCode } from "./errors.js";
import { run, runInteractive, runOrThrow } from "./exec.js";
import { CHART_DIR, DOCKERFILE_PATH, VALUES_PATH, generate } from "./generate.js";
import { logHeader, logInfo, logOk, logStep } from "./log.js";
import { bindRegistry, validateUsername, type DeploymentTarget } from "./registry.js";

interface Prerequisite {
  tool: string;
  command: string;
  args: string[];
}

export const PREREQUISITES: Prerequisite[] = [
  { tool: "Docker", command: "docker", args: ["--version"] },
  { tool: "kubectl", command: "kubectl", args: ["version", "--client"] },
  { tool: "Helm", command: "helm", args: ["version", "--short"] },
  { tool: "Minikube", command: "minikube", args: ["version", "--short"] },
];

export async function checkPrerequisites(config: Pick<Config, "skipMinikube">): Promise<void> {
  logStep(0, "Checking Prerequisites");

  for (const { tool, command, args } of PREREQUISITES) {
    if (command === "minikube" && config.skipMinikube) {
      continue;
    }
    const result = await run(command, args);
    if (!result.ok) {
      throw new DeployError(DeployErrorCode.MISSING_TOOL, `${tool} not found. Please install ${tool}.`, {
        tool,
      });
    }
    logOk(`${tool} found`);
  }

  const daemon = await run("docker", ["info"], { quiet: true });
  if (!daemon.ok) {
    throw new DeployError(DeployErrorCode.DOCKER_DOWN, "Docker daemon not running. Start Docker first.");
  }
  logOk("Docker daemon is running");
}

export async function resolveUsername(config: Pick<Config, "username" | "interactive">): Promise<string> {
  logStep(1, "Docker Hub Configuration");

  let username = config.username;
  if (username === undefined) {
    if (!config.interactive) {
      throw new DeployError(
        DeployErrorCode.INVALID_USERNAME,
        "No registry username: pass --username or set DOCKERHUB_USERNAME"
      );
    }
    username = await input({ message: "Enter your Docker Hub username:" });
  }

  const validated = validateUsername(username);
  logOk(`Docker Hub username: ${validated}`);
  return validated;
}

export async function confirmDeployment(config: Pick<Config, "assumeYes">): Promise<void> {
  if (config.assumeYes) {
    return;
  }
  const proceed = await confirm({ message: "Proceed with deployment?", default: true });
  if (!proceed) {
    throw new DeployError(DeployErrorCode.CANCELLED, "Deployment cancelled");
  }
}

export async function ensureMinikube(config: Pick<Config, "skipMinikube">): Promise<void> {
  logStep(4, "Starting Minikube");

  if (config.skipMinikube) {
    logInfo("Skipping minikube, using the current kubectl context");
  } else {
    const status = await run("minikube", ["status"], { quiet: true });
    if (status.ok && status.stdout.includes("Running")) {
      logOk("Minikube already running");
    } else {
      logInfo("Starting Minikube (may take a few minutes)...");
      await runOrThrow("minikube", ["start", "--driver=docker"]);
      logOk("Minikube started");
    }
  }

  const nodes = await run("kubectl", ["get", "nodes"]);
  if (nodes.ok) {
    logOk("Kubernetes cluster ready");
  }
}

export async function buildImage(image: string, dockerfile: string): Promise<void> {
  logStep(5, "Building Docker Image");
  logInfo(`Building: ${image}`);
  await runOrThrow("docker", ["build", "-t", image, "-f", dockerfile, "."]);
  logOk("Image built successfully");
}

export async function pushImage(image: string): Promise<void> {
  logStep(6, "Pushing Image to Docker Hub");

  const info = await run("docker", ["info"], { quiet: true });
  if (!info.ok || !info.stdout.includes("Username:")) {
    logInfo("Logging in to Docker Hub...");
    await runInteractive("docker", ["login"]);
  }

  logInfo(`Pushing: ${image}`);
  await runOrThrow("docker", ["push", image]);
  logOk("Image pushed to Docker Hub");
}

export async function installChart(
  target: DeploymentTarget,
  chartDir: string,
  config: Pick<Config, "settleDelayMs" | "readyDelayMs">
): Promise<void> {
  const { appName, namespace } = target;
  logStep(7, "Deploying to Kubernetes with Helm");

  // A previous release may not exist; both teardown commands are allowed to fail
  logInfo("Cleaning up existing deployment...");
  await run("helm", ["uninstall", appName, "--namespace", namespace]);
  await run("kubectl", ["delete", "namespace", namespace]);
  await sleep(config.settleDelayMs);

  // The namespace must exist before helm renders the chart, so the Namespace
  // template's lookup guard skips it
  await runOrThrow("kubectl", ["create", "namespace", namespace]);

  logInfo(`Installing ${appName}...`);
  await runOrThrow("helm", ["install", appName, chartDir, "--namespace", namespace, "--create-namespace"]);
  logOk("Helm chart installed");

  logInfo("Waiting for pod to be ready...");
  await sleep(config.readyDelayMs);
  const ready = await run("kubectl", [
    "wait",
    "--for=condition=ready",
    "pod",
    "-l",
    `app=${appName}`,
    "-n",
    namespace,
    "--timeout=120s",
  ]);
  if (ready.ok) {
    logOk("Pod is ready");
  } else {
    logInfo("Pod did not become ready within 120s; check kubectl get pods");
  }
}

export async function verifyDeployment(target: DeploymentTarget): Promise<void> {
  logStep(8, "Verifying Deployment");

  logInfo(`Resources in namespace '${target.namespace}':`);
  await run("kubectl", ["get", "all", "-n", target.namespace]);

  logInfo("NetworkPolicies:");
  await run("kubectl", ["get", "networkpolicy", "-n", target.namespace]);
}

export function nextSteps(target: DeploymentTarget, username: string): string {
  const { appName, namespace } = target;
  return `
Next steps:
-----------
Verify deployment:
  kubectl get all -n ${namespace}
  kubectl get networkpolicy -n ${namespace}

View logs:
  kubectl logs -l app=${appName} -n ${namespace}

Cleanup:
  helm uninstall ${appName} --namespace ${namespace}
  kubectl delete namespace ${namespace}

Docker Hub:
  https://hub.docker.com/r/${username}/${appName}
`;
}

/**
 * Generate the artifacts, bind them to a registry account, build and push
 * the image and install the chart
 */
export async function deploy(config: Config): Promise<DeploymentTarget> {
  logHeader("PROFILE DEPLOYMENT");

  await checkPrerequisites(config);
  const username = await resolveUsername(config);

  logStep(2, "Generating Files from Profile");
  logInfo(`Reading profile: ${config.profilePath}`);
  await generate({
    profilePath: config.profilePath,
    outDir: config.outDir,
    strictPeers: config.strictPeers,
  });
  logOk(`All files generated in ${config.outDir}/ directory`);

  logStep(3, "Updating values.yaml with Docker Hub Username");
  const target = await bindRegistry(join(config.outDir, VALUES_PATH), username);
  logOk("values.yaml updated");

  logInfo("Deployment Info:");
  logInfo(`  Image: ${target.image}`);
  logInfo(`  Namespace: ${target.namespace}`);
  await confirmDeployment(config);

  await ensureMinikube(config);
  await buildImage(target.image, join(config.outDir, DOCKERFILE_PATH));
  await pushImage(target.image);
  await installChart(target, join(config.outDir, CHART_DIR), config);
  await verifyDeployment(target);

  logHeader("DEPLOYMENT COMPLETE!");
  console.log(nextSteps(target, username));
  return target;
}
