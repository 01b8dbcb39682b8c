import type { Profile } from "./profile.js";

const SHELL_SAFE = /^[A-Za-z0-9_.+:=~@%/-]+$/;

/**
 * Quote an argument for /bin/sh unless it is made only of safe characters
 */
export function shellQuote(arg: string): string {
  if (SHELL_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * JSON exec form used by CMD, e.g. ["/bin/sh", "-c", "..."]
 */
export function execForm(command: readonly string[]): string {
  return `[${command.map((part) => JSON.stringify(part)).join(", ")}]`;
}

/**
 * Render the Dockerfile for a profile
 */
export function renderDockerfile(profile: Profile): string {
  const baseImage = `${profile.distro}:${profile.osVersion}`;
  const install = ["apt-get", "install", "-y", ...profile.packages.map(shellQuote)].join(" ");

  return [
    `FROM ${baseImage}`,
    "",
    "RUN apt-get update && \\",
    `    ${install} && \\`,
    "    rm -rf /var/lib/apt/lists/*",
    "",
    `CMD ${execForm(profile.command)}`,
    "",
  ].join("\n");
}
