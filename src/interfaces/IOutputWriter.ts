import { ComposedBinding } from "./IBindingUnit";

export interface IOutputWriter {
    ensureRoot(): void;
    outputPathFor(composed: ComposedBinding, destinationDir: string): string;
    write(composed: ComposedBinding, destinationDir: string): string;
}
