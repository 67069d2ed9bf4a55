/**
 * Base class for every failure the generator reports. Document-scoped errors
 * carry the path of the scenario document they belong to.
 */
export class StepScaffoldError extends Error {
    constructor(message: string, public readonly documentPath?: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

/** Scenario document missing, unreadable or too large. The document is skipped. */
export class ReadError extends StepScaffoldError {}

/** Binding unit could not be persisted. The document's output is skipped. */
export class WriteError extends StepScaffoldError {}

/** Aborts the whole run (missing input directory, output root cannot be created). */
export class StructuralError extends StepScaffoldError {}

export class ConfigError extends StepScaffoldError {}

export function describeError(error: unknown): string {
    if (typeof error === "string") return error;
    if (error instanceof Error) return error.message;
    const json = JSON.stringify(error);
    return json === undefined ? String(error) : json;
}
