import { ContinuationPolicy } from "./IStepExtractor";
import { TemplateName } from "./IBindingTemplate";

export interface RunOptions {
    inputDir: string;
    outputDir: string;
    template: TemplateName;
    namespace: string;
    suffix: string;
    continuation: ContinuationPolicy;
    extensions: string[];
    language: string;
    dryRun: boolean;
}
