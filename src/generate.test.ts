import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parse, parseAllDocuments } from "yaml";
import { ProfileErrorCode } from "./errors.js";
import { generate, renderArtifacts, writeArtifacts } from "./generate.js";
import { Profile } from "./profile.js";

const TEST_DIR = join(tmpdir(), "kubeprofile-generate-test");
const PROFILE_PATH = join(TEST_DIR, "profile.yaml");
const OUT_DIR = join(TEST_DIR, "generated");

const WORKER_YAML = `profile:
  name: worker
  version: "1"
os:
  distro: ubuntu
  version: "22.04"
packages:
  - curl
network:
  default_deny_ingress: true
  default_deny_egress: false
  rules:
    - direction: ingress
      from:
        namespace: monitoring
      protocol: TCP
      port: 9090
`;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("generate", () => {
  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await mkdir(TEST_DIR, { recursive: true });
    await writeFile(PROFILE_PATH, WORKER_YAML, "utf-8");
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("should write the Dockerfile and the chart", async () => {
    const { profile, written } = await generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR });

    expect(profile.name).toBe("worker");
    expect(written).toEqual([
      join(OUT_DIR, "Dockerfile"),
      join(OUT_DIR, "helm", "Chart.yaml"),
      join(OUT_DIR, "helm", "values.yaml"),
      join(OUT_DIR, "helm", "templates", "namespace.yaml"),
      join(OUT_DIR, "helm", "templates", "deployment.yaml"),
      join(OUT_DIR, "helm", "templates", "service.yaml"),
      join(OUT_DIR, "helm", "templates", "networkpolicy.yaml"),
    ]);
  });

  it("should render the worker profile", async () => {
    await generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR });

    const dockerfile = await readFile(join(OUT_DIR, "Dockerfile"), "utf-8");
    expect(dockerfile.split("\n")[0]).toBe("FROM ubuntu:22.04");
    expect(dockerfile.split("\n")[3]).toBe("    apt-get install -y curl && \\");

    const values: unknown = parse(await readFile(join(OUT_DIR, "helm", "values.yaml"), "utf-8"));
    expect(values).toMatchObject({
      image: { repository: "YOUR_DOCKERHUB_USERNAME/worker", tag: "ubuntu-worker-v1" },
      namespace: "worker",
      app: { name: "worker" },
    });

    const policies = parseAllDocuments(
      await readFile(join(OUT_DIR, "helm", "templates", "networkpolicy.yaml"), "utf-8")
    );
    const allow: unknown = Array.isArray(policies) ? policies[1].toJS() : undefined;
    expect(allow).toMatchObject({
      spec: {
        policyTypes: ["Ingress"],
        ingress: [
          {
            from: [{ namespaceSelector: { matchLabels: { "kubernetes.io/metadata.name": "monitoring" } } }],
            ports: [{ protocol: "TCP", port: 9090 }],
          },
        ],
        egress: [],
      },
    });
  });

  it("should produce identical files when run twice", async () => {
    const first = await generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR });
    const firstContents = await Promise.all(first.written.map((path) => readFile(path, "utf-8")));

    const second = await generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR });
    const secondContents = await Promise.all(second.written.map((path) => readFile(path, "utf-8")));

    expect(secondContents).toEqual(firstContents);
  });

  it("should overwrite files from a previous run", async () => {
    await mkdir(OUT_DIR, { recursive: true });
    await writeFile(join(OUT_DIR, "Dockerfile"), "FROM scratch\n", "utf-8");

    await generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR });

    const dockerfile = await readFile(join(OUT_DIR, "Dockerfile"), "utf-8");
    expect(dockerfile.startsWith("FROM ubuntu:22.04\n")).toBe(true);
  });

  it("should not write anything when a required field is missing", async () => {
    await writeFile(PROFILE_PATH, "profile:\n  name: worker\n  version: \"1\"\npackages: []\n", "utf-8");

    await expect(generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR })).rejects.toMatchObject({
      code: ProfileErrorCode.MISSING_FIELD,
      context: { field: "os.distro" },
    });
    expect(await exists(join(OUT_DIR, "Dockerfile"))).toBe(false);
  });

  it("should honor strict peer checking", async () => {
    await writeFile(
      PROFILE_PATH,
      WORKER_YAML.replace("      from:\n        namespace: monitoring\n", ""),
      "utf-8"
    );

    await expect(
      generate({ profilePath: PROFILE_PATH, outDir: OUT_DIR, strictPeers: true })
    ).rejects.toMatchObject({
      code: ProfileErrorCode.MISSING_FIELD,
      context: { field: "network.rules[0].from.namespace" },
    });
  });
});

describe("writeArtifacts", () => {
  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("should stop at the first file it cannot write", async () => {
    const blocker = join(TEST_DIR, "blocker");
    await writeFile(blocker, "", "utf-8");
    const profile = Profile.fromYaml(WORKER_YAML);
    const artifacts = await renderArtifacts(profile);

    await expect(writeArtifacts(artifacts, join(blocker, "out"))).rejects.toMatchObject({
      code: ProfileErrorCode.WRITE_FAILED,
      context: { path: join(blocker, "out", "Dockerfile") },
    });
  });
});
