import * as path from "path";
import * as fs from "fs";
import * as dotenv from "dotenv";
import { AppEnv, CliArgs, IConfigService } from "./interfaces/IConfigService";
import { TemplateName } from "./interfaces/IBindingTemplate";
import { ContinuationPolicy } from "./interfaces/IStepExtractor";
import { RunOptions } from "./interfaces/RunOptions";
import { ConfigError } from "./errors";
import { DEFAULT_LANGUAGE, isKnownLanguage } from "./StepExtractor";
import { DEFAULT_SUFFIX } from "./BindingComposer";
import { DEFAULT_EXTENSIONS } from "./DocumentReader";
import { DEFAULT_NAMESPACE, TEMPLATE_NAMES } from "./templates";

const CONTINUATION_POLICIES: readonly ContinuationPolicy[] = ["ignore", "inherit"];
const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const SUFFIX_PATTERN = /^[A-Za-z0-9_]*$/;

export class ConfigService implements IConfigService {
  loadEnvironment(): AppEnv {
    // Allow a local .env (gitignored) to hold per-project defaults.
    const envPath = process.env.STEPGEN_ENV || path.resolve(".env");
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
    }

    return {
      template: this.parseTemplate(process.env.STEPGEN_TEMPLATE, "csharp", "STEPGEN_TEMPLATE"),
      namespace: this.parseNamespace(process.env.STEPGEN_NAMESPACE || DEFAULT_NAMESPACE, "STEPGEN_NAMESPACE"),
      suffix: this.parseSuffix(process.env.STEPGEN_SUFFIX ?? DEFAULT_SUFFIX, "STEPGEN_SUFFIX"),
      continuation: this.parseContinuation(process.env.STEPGEN_CONTINUATION, "ignore", "STEPGEN_CONTINUATION"),
      language: this.parseLanguage(process.env.STEPGEN_LANGUAGE || DEFAULT_LANGUAGE, "STEPGEN_LANGUAGE"),
      extensions: this.parseExtensions(process.env.STEPGEN_EXTENSIONS?.split(",") ?? DEFAULT_EXTENSIONS),
    };
  }

  /** CLI arguments win over environment defaults. */
  loadArgs(argv: CliArgs, env: AppEnv): RunOptions {
    return {
      inputDir: path.resolve(argv.input),
      outputDir: path.resolve(argv.output),
      template: this.parseTemplate(argv.template, env.template, "--template"),
      namespace: argv.namespace !== undefined ? this.parseNamespace(argv.namespace, "--namespace") : env.namespace,
      suffix: argv.suffix !== undefined ? this.parseSuffix(argv.suffix, "--suffix") : env.suffix,
      continuation: this.parseContinuation(argv.continuation, env.continuation, "--continuation"),
      language: argv.language !== undefined ? this.parseLanguage(argv.language, "--language") : env.language,
      extensions: argv.extensions?.length ? this.parseExtensions(argv.extensions) : env.extensions,
      dryRun: argv["dry-run"] ?? false,
    };
  }

  private parseTemplate(value: string | undefined, defaultValue: TemplateName, source: string): TemplateName {
    if (value === undefined || value === "") return defaultValue;
    const match = TEMPLATE_NAMES.find((name) => name === value.toLowerCase());
    if (!match) {
      throw new ConfigError(`Invalid ${source} '${value}'. Expected one of: ${TEMPLATE_NAMES.join(", ")}.`);
    }
    return match;
  }

  private parseContinuation(
    value: string | undefined,
    defaultValue: ContinuationPolicy,
    source: string
  ): ContinuationPolicy {
    if (value === undefined || value === "") return defaultValue;
    const match = CONTINUATION_POLICIES.find((policy) => policy === value.toLowerCase());
    if (!match) {
      throw new ConfigError(`Invalid ${source} '${value}'. Expected one of: ${CONTINUATION_POLICIES.join(", ")}.`);
    }
    return match;
  }

  private parseNamespace(value: string, source: string): string {
    if (!NAMESPACE_PATTERN.test(value)) {
      throw new ConfigError(`Invalid ${source} '${value}': expected a dotted identifier such as Acceptance.Steps.`);
    }
    return value;
  }

  private parseSuffix(value: string, source: string): string {
    if (!SUFFIX_PATTERN.test(value)) {
      throw new ConfigError(`Invalid ${source} '${value}': only letters, digits and underscores are allowed.`);
    }
    return value;
  }

  private parseLanguage(value: string, source: string): string {
    if (!isKnownLanguage(value)) {
      throw new ConfigError(`Invalid ${source} '${value}': not a Gherkin language code.`);
    }
    return value;
  }

  private parseExtensions(values: readonly string[]): string[] {
    const extensions = values
      .flatMap((value) => value.split(","))
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
      .map((value) => (value.startsWith(".") ? value : `.${value}`));
    return extensions.length ? Array.from(new Set(extensions)) : [...DEFAULT_EXTENSIONS];
  }
}
