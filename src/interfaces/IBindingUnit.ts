import { StepKind, StepPhrase } from "./IScenarioDocument";

export type DiagnosticCode = "ParseAmbiguity" | "IdentifierCollision";

export interface Diagnostic {
    severity: "warning" | "info";
    code: DiagnosticCode;
    message: string;
    line?: number;
}

export interface BindingEntry {
    readonly phrase: StepPhrase;
    readonly identifier: string;
}

export interface BindingUnit {
    readonly name: string;
    /** Base name of the scenario document the unit was generated from. */
    readonly sourceName: string;
    readonly groups: Readonly<Record<StepKind, readonly BindingEntry[]>>;
}

export interface ComposedBinding {
    unit: BindingUnit;
    fileName: string;
    source: string;
    diagnostics: Diagnostic[];
}
