import * as fs from 'fs';
import * as path from 'path';
import { ComposedBinding } from './interfaces/IBindingUnit';
import { IOutputWriter } from './interfaces/IOutputWriter';
import { StructuralError, WriteError, describeError } from './errors';
import { isSafePath } from './utils/PathUtils';

export interface OutputWriterOptions {
    outputRoot: string;
    /** Resolve output paths without touching the filesystem. */
    dryRun?: boolean;
}

export class OutputWriter implements IOutputWriter {
    private readonly outputRoot: string;

    constructor(private readonly options: OutputWriterOptions) {
        this.outputRoot = path.resolve(options.outputRoot);
    }

    /** Creates the output root up front. Safe to call repeatedly. */
    public ensureRoot(): void {
        if (this.options.dryRun) return;

        try {
            fs.mkdirSync(this.outputRoot, { recursive: true });
        } catch (err) {
            throw new StructuralError(`Cannot create output directory ${this.outputRoot}: ${describeError(err)}`, undefined, err);
        }
        if (!fs.statSync(this.outputRoot).isDirectory()) {
            throw new StructuralError(`Output path is not a directory: ${this.outputRoot}`);
        }
    }

    public outputPathFor(composed: ComposedBinding, destinationDir: string): string {
        const outputPath = path.resolve(destinationDir, composed.fileName);
        if (!isSafePath(outputPath, this.outputRoot)) {
            throw new WriteError(`Refusing to write outside the output directory: ${outputPath}`);
        }
        return outputPath;
    }

    /** Writes the rendered unit, creating destinationDir when absent. Returns the file path. */
    public write(composed: ComposedBinding, destinationDir: string): string {
        const outputPath = this.outputPathFor(composed, destinationDir);
        if (this.options.dryRun) {
            return outputPath;
        }

        try {
            fs.mkdirSync(path.dirname(outputPath), { recursive: true });
            fs.writeFileSync(outputPath, composed.source, 'utf-8');
        } catch (err) {
            throw new WriteError(`Cannot write ${outputPath}: ${describeError(err)}`, undefined, err);
        }
        return outputPath;
    }
}
