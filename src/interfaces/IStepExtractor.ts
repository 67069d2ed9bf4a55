import { Diagnostic } from "./IBindingUnit";
import { ScenarioDocument, StepPhrase } from "./IScenarioDocument";

export type ContinuationPolicy = "ignore" | "inherit";

export interface ExtractionResult {
    phrases: StepPhrase[];
    diagnostics: Diagnostic[];
    /** Gherkin dialect the document was scanned with. */
    language: string;
}

export interface IStepExtractor {
    extract(document: ScenarioDocument): ExtractionResult;
}
