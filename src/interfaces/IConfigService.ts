import { ContinuationPolicy } from "./IStepExtractor";
import { TemplateName } from "./IBindingTemplate";
import { RunOptions } from "./RunOptions";

export type AppEnv = {
    template: TemplateName;
    namespace: string;
    suffix: string;
    continuation: ContinuationPolicy;
    language: string;
    extensions: string[];
};

export type CliArgs = {
    input: string;
    output: string;
    template?: string;
    namespace?: string;
    suffix?: string;
    continuation?: string;
    language?: string;
    extensions?: string[];
    "dry-run"?: boolean;
};

export interface IConfigService {
    loadEnvironment(): AppEnv;
    loadArgs(argv: CliArgs, env: AppEnv): RunOptions;
}
