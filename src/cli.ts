import yargs from "yargs";
import { resolveConfig } from "./config.js";
import { deploy } from "./deploy.js";
import { generate } from "./generate.js";

/**
 * The kubeprofile command line. Validation failures print the usage text and
 * reject; errors from a command handler reject unchanged.
 */
export function buildCli(args: string[]) {
  return yargs(args)
    .scriptName("kubeprofile")
    .option("out", {
      type: "string",
      describe: "Output directory for the Dockerfile and Helm chart",
    })
    .option("strict", {
      type: "boolean",
      describe: "Fail on network rules without a peer namespace",
    })
    .command(
      "generate [profile]",
      "Render the Dockerfile and Helm chart for a profile",
      (cmd) => cmd.positional("profile", { type: "string", describe: "Profile YAML file" }),
      async (argv) => {
        const config = resolveConfig({
          profilePath: argv.profile,
          outDir: argv.out,
          strictPeers: argv.strict,
        });

        console.log("\n=== Kubernetes Profile Generator ===");
        console.log(`Reading profile: ${config.profilePath}\n`);
        const { profile } = await generate(config);

        console.log("\n=== Generation Complete ===");
        console.log(`All files generated in ${config.outDir}/ directory`);
        console.log("\nNext steps:");
        console.log("  1. Run: kubeprofile deploy, or bind values.yaml to your registry account by hand");
        console.log(`  2. Run: docker build -t <username>/${profile.name}:<tag> -f ${config.outDir}/Dockerfile .`);
        console.log(`  3. Run: docker push <username>/${profile.name}:<tag>`);
        console.log(
          `  4. Run: helm install ${profile.name} ${config.outDir}/helm --namespace ${profile.name} --create-namespace`
        );
      }
    )
    .command(
      "deploy [profile]",
      "Generate, build, push and install the chart on the current cluster",
      (cmd) =>
        cmd
          .positional("profile", { type: "string", describe: "Profile YAML file" })
          .option("username", { type: "string", describe: "Docker Hub username" })
          .option("yes", { alias: "y", type: "boolean", describe: "Skip the confirmation prompt" })
          .option("skip-minikube", {
            type: "boolean",
            describe: "Deploy to the current kubectl context without starting minikube",
          }),
      async (argv) => {
        await deploy(
          resolveConfig({
            profilePath: argv.profile,
            outDir: argv.out,
            strictPeers: argv.strict,
            username: argv.username,
            assumeYes: argv.yes,
            skipMinikube: argv["skip-minikube"],
          })
        );
      }
    )
    .demandCommand(1)
    .strict()
    .fail((message, error, cli) => {
      if (error) {
        throw error;
      }
      cli.showHelp();
      throw new Error(message);
    });
}
