#!/usr/bin/env node
import yargsFactory from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { ConfigService } from "./config";
import { ConsoleLogger } from "./ConsoleLogger";
import { createApp } from "./App";
import { TEMPLATE_NAMES } from "./templates";

function run() {
  const argv = yargsFactory(hideBin(process.argv))
    .scriptName("stepgen")
    .usage("$0 --input <dir> --output <dir> [options]")
    .options({
      input: {
        alias: "i",
        type: "string",
        demandOption: true,
        describe: "Directory containing scenario documents (searched recursively)",
      },
      output: {
        alias: "o",
        type: "string",
        demandOption: true,
        describe: "Directory receiving one binding file per document",
      },
      template: {
        alias: "t",
        type: "string",
        choices: TEMPLATE_NAMES,
        describe: "Binding language (default: STEPGEN_TEMPLATE or csharp)",
      },
      namespace: {
        type: "string",
        describe: "C# namespace of generated classes (default: STEPGEN_NAMESPACE or Acceptance.Steps)",
      },
      suffix: {
        type: "string",
        describe: "Suffix appended to the binding class name (default: Steps)",
      },
      continuation: {
        type: "string",
        choices: ["ignore", "inherit"],
        describe: "Whether And/But lines produce stubs of the inherited kind",
      },
      extensions: {
        type: "string",
        array: true,
        describe: "Recognized document extensions (default: .feature)",
      },
      language: {
        type: "string",
        describe: "Default Gherkin language for documents without a '# language:' header",
      },
      "dry-run": {
        type: "boolean",
        default: false,
        describe: "Report what would be generated without writing files",
      },
    })
    .strict()
    .parseSync();

  const config = new ConfigService();
  const env = config.loadEnvironment();
  const options = config.loadArgs(argv, env);
  const logger = new ConsoleLogger();

  if (options.dryRun) {
    logger.log("ℹ️ Dry run: no files will be written.");
  }

  const summary = createApp(options, logger).run(options);
  process.exitCode = summary.failed.length > 0 ? 1 : 0;
}

try {
  run();
} catch (err) {
  console.error("💥 Error during execution:", err);
  process.exit(1);
}
