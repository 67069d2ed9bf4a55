export const STEP_KINDS = ["Given", "When", "Then"] as const;

export type StepKind = (typeof STEP_KINDS)[number];

export interface ScenarioDocument {
    readonly path: string;
    readonly rawText: string;
}

export interface StepPhrase {
    readonly kind: StepKind;
    /** Verbatim step text after the keyword, whitespace-trimmed. */
    readonly text: string;
    /** 0-based index of the Background/Scenario block, -1 before the first one. */
    readonly originScenarioIndex: number;
    /** 1-based line in the source document. */
    readonly line: number;
}
