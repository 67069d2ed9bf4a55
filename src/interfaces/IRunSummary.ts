import { Diagnostic } from "./IBindingUnit";

export type DocumentStatus = "succeeded" | "skipped" | "failed";

export interface DocumentOutcome {
    path: string;
    status: DocumentStatus;
    outputPath?: string;
    stubCount: number;
    diagnostics: Diagnostic[];
    error?: Error;
}

export interface RunSummary {
    succeeded: DocumentOutcome[];
    skipped: DocumentOutcome[];
    failed: DocumentOutcome[];
}
