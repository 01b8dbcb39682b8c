import { fileURLToPath } from "node:url";
import { dirname, join, resolve } from "node:path";
import { generate } from "../src/index.js";

// Get the absolute path of the current directory (example subdirectory)
const __filename = fileURLToPath(import.meta.url);
const exampleDir = resolve(dirname(__filename));

console.log("=".repeat(80));
console.log("Rendering the example worker profile");
console.log("=".repeat(80));

const { profile, written } = await generate({
  profilePath: join(exampleDir, "profile.yaml"),
  outDir: join(exampleDir, "generated"),
});

console.log("\n" + "=".repeat(80));
console.log(`Done! ${written.length} files written for ${profile.name}.`);
console.log("=".repeat(80));
