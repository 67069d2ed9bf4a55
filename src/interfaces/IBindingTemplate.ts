import { BindingEntry, BindingUnit } from "./IBindingUnit";
import { StepKind } from "./IScenarioDocument";

export type TemplateName = "csharp" | "typescript";

export interface IBindingTemplate {
    readonly name: TemplateName;
    readonly fileExtension: string;
    renderUnit(unit: BindingUnit, renderedGroups: string[]): string;
    renderGroup(kind: StepKind, entries: readonly BindingEntry[]): string;
    renderStub(kind: StepKind, entry: BindingEntry): string;
}
