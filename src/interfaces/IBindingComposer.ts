import { ComposedBinding } from "./IBindingUnit";
import { ScenarioDocument, StepPhrase } from "./IScenarioDocument";

export type IdentifierDeriver = (text: string) => string;

export interface IBindingComposer {
    compose(document: ScenarioDocument, phrases: readonly StepPhrase[]): ComposedBinding;
}
