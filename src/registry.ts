import { readFile, writeFile } from "node:fs/promises";
import { parseDocument } from "yaml";
import { REGISTRY_PLACEHOLDER } from "./chart.js";
import { DeployError, DeployErrorCode } from "./errors.js";

/**
 * Registry account or host/account prefix, lowercase as image references require
 */
const USERNAME_PATTERN = /^[a-z0-9]+(?:[._:/-][a-z0-9]+)*$/;

type ValuesDocument = ReturnType<typeof parseDocument>;

/**
 * What the deployment steps need to know once the chart is bound
 */
export interface DeploymentTarget {
  /** Full image reference, repository:tag */
  image: string;
  appName: string;
  namespace: string;
}

export function validateUsername(username: string): string {
  const trimmed = username.trim();
  if (!trimmed) {
    throw new DeployError(DeployErrorCode.INVALID_USERNAME, "Username cannot be empty");
  }
  if (!USERNAME_PATTERN.test(trimmed)) {
    throw new DeployError(
      DeployErrorCode.INVALID_USERNAME,
      `Invalid registry username "${trimmed}": use lowercase letters, digits and . _ - separators`,
      { username: trimmed }
    );
  }
  return trimmed;
}

function readString(doc: ValuesDocument, path: string[], valuesPath: string): string {
  const value: unknown = doc.getIn(path);
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  throw new DeployError(
    DeployErrorCode.VALUES_MALFORMED,
    `${valuesPath} has no usable "${path.join(".")}"`,
    { path: valuesPath, field: path.join(".") }
  );
}

/**
 * Replace the registry placeholder in image.repository with a username.
 *
 * Only the leading placeholder segment of that one field is touched, so
 * profile data that happens to contain the placeholder text is left alone.
 * A chart can be bound once: binding an already bound chart fails.
 */
export async function bindRegistry(valuesPath: string, username: string): Promise<DeploymentTarget> {
  const account = validateUsername(username);

  let text: string;
  try {
    text = await readFile(valuesPath, "utf-8");
  } catch (error) {
    throw new DeployError(DeployErrorCode.VALUES_NOT_FOUND, `File not found: ${valuesPath}`, {
      path: valuesPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new DeployError(
      DeployErrorCode.VALUES_MALFORMED,
      `${valuesPath} is not valid YAML: ${doc.errors[0].message}`,
      { path: valuesPath }
    );
  }

  const repository = readString(doc, ["image", "repository"], valuesPath);
  const prefix = `${REGISTRY_PLACEHOLDER}/`;
  if (!repository.startsWith(prefix)) {
    throw new DeployError(
      DeployErrorCode.ALREADY_BOUND,
      `image.repository in ${valuesPath} is already bound to "${repository}"`,
      { path: valuesPath, repository }
    );
  }

  const bound = `${account}/${repository.slice(prefix.length)}`;
  doc.setIn(["image", "repository"], bound);
  await writeFile(valuesPath, doc.toString({ lineWidth: 0 }), "utf-8");

  return {
    image: `${bound}:${readString(doc, ["image", "tag"], valuesPath)}`,
    appName: readString(doc, ["app", "name"], valuesPath),
    namespace: readString(doc, ["namespace"], valuesPath),
  };
}
