import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parse } from "yaml";
import { REGISTRY_PLACEHOLDER, buildChartValues, renderYaml } from "./chart.js";
import { DeployErrorCode } from "./errors.js";
import { Profile } from "./profile.js";
import { bindRegistry, validateUsername } from "./registry.js";

const TEST_DIR = join(tmpdir(), "kubeprofile-registry-test");
const VALUES_PATH = join(TEST_DIR, "values.yaml");

function valuesFor(name: string): string {
  const profile = Profile.fromObject({
    profile: { name, version: "1" },
    os: { distro: "ubuntu", version: "22.04" },
  });
  return renderYaml(buildChartValues(profile));
}

describe("bindRegistry", () => {
  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true });
    await writeFile(VALUES_PATH, valuesFor("worker"), "utf-8");
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("should replace the placeholder and describe the target", async () => {
    const target = await bindRegistry(VALUES_PATH, "testuser");

    expect(target).toEqual({
      image: "testuser/worker:ubuntu-worker-v1",
      appName: "worker",
      namespace: "worker",
    });
    const values: unknown = parse(await readFile(VALUES_PATH, "utf-8"));
    expect(values).toMatchObject({ image: { repository: "testuser/worker", tag: "ubuntu-worker-v1" } });
  });

  it("should trim the username", async () => {
    const target = await bindRegistry(VALUES_PATH, "  testuser \n");

    expect(target.image).toBe("testuser/worker:ubuntu-worker-v1");
  });

  it("should only touch the repository field", async () => {
    await writeFile(VALUES_PATH, valuesFor(REGISTRY_PLACEHOLDER), "utf-8");

    const target = await bindRegistry(VALUES_PATH, "testuser");

    expect(target.appName).toBe(REGISTRY_PLACEHOLDER);
    expect(target.namespace).toBe(REGISTRY_PLACEHOLDER);
    expect(target.image).toBe(`testuser/${REGISTRY_PLACEHOLDER}:ubuntu-${REGISTRY_PLACEHOLDER}-v1`);
  });

  it("should refuse to bind twice", async () => {
    await bindRegistry(VALUES_PATH, "testuser");

    await expect(bindRegistry(VALUES_PATH, "otheruser")).rejects.toMatchObject({
      code: DeployErrorCode.ALREADY_BOUND,
    });
    const values: unknown = parse(await readFile(VALUES_PATH, "utf-8"));
    expect(values).toMatchObject({ image: { repository: "testuser/worker" } });
  });

  it("should fail when values.yaml is missing", async () => {
    const missing = join(TEST_DIR, "nope.yaml");

    await expect(bindRegistry(missing, "testuser")).rejects.toMatchObject({
      code: DeployErrorCode.VALUES_NOT_FOUND,
      message: `File not found: ${missing}`,
    });
  });

  it("should fail when the repository field is absent", async () => {
    await writeFile(VALUES_PATH, "replicaCount: 1\n", "utf-8");

    await expect(bindRegistry(VALUES_PATH, "testuser")).rejects.toMatchObject({
      code: DeployErrorCode.VALUES_MALFORMED,
    });
  });
});

describe("validateUsername", () => {
  it("should reject an empty username", () => {
    expect(() => validateUsername("   ")).toThrow("Username cannot be empty");
  });

  it("should reject characters an image reference cannot hold", () => {
    expect(() => validateUsername("Test User")).toThrow('Invalid registry username "Test User"');
  });

  it("should accept a registry host prefix", () => {
    expect(validateUsername("registry.local:5000/team")).toBe("registry.local:5000/team");
  });
});
