import * as fs from 'fs';
import * as glob from 'glob';
import { TextDecoder } from 'util';
import { IDocumentReader } from './interfaces/IDocumentReader';
import { ScenarioDocument } from './interfaces/IScenarioDocument';
import { ReadError, StructuralError, describeError } from './errors';

export const MAX_DOCUMENT_SIZE = 50 * 1024 * 1024; // 50MB
export const DEFAULT_EXTENSIONS = ['.feature'];

// fatal: malformed bytes raise instead of turning into U+FFFD; the BOM is dropped
const UTF8 = new TextDecoder('utf-8', { fatal: true });

export class DocumentReader implements IDocumentReader {
    constructor(private readonly maxBytes: number = MAX_DOCUMENT_SIZE) { }

    public read(filePath: string): ScenarioDocument {
        let stats: fs.Stats;
        try {
            stats = fs.statSync(filePath);
        } catch (err) {
            throw new ReadError(`Cannot access scenario document: ${filePath} (${describeError(err)})`, filePath, err);
        }

        if (!stats.isFile()) {
            throw new ReadError(`Scenario document is not a file: ${filePath}`, filePath);
        }
        if (stats.size > this.maxBytes) {
            throw new ReadError(
                `Scenario document is too large (${(stats.size / 1024 / 1024).toFixed(2)}MB): ${filePath}. Max allowed: ${(this.maxBytes / 1024 / 1024).toFixed(2)}MB.`,
                filePath
            );
        }

        let bytes: Buffer;
        try {
            bytes = fs.readFileSync(filePath);
        } catch (err) {
            throw new ReadError(`Cannot read scenario document: ${filePath} (${describeError(err)})`, filePath, err);
        }

        let rawText: string;
        try {
            rawText = UTF8.decode(bytes);
        } catch (err) {
            throw new ReadError(`Scenario document is not valid UTF-8: ${filePath}`, filePath, err);
        }
        return Object.freeze({ path: filePath, rawText });
    }

    /**
     * Lists every file below inputDir (recursively) carrying one of the
     * extensions, as sorted absolute paths.
     */
    public findDocuments(inputDir: string, extensions: readonly string[]): string[] {
        if (!fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
            throw new StructuralError(`Input directory not found: ${inputDir}`);
        }

        const suffixes = extensions.length > 0 ? extensions : DEFAULT_EXTENSIONS;
        const pattern = suffixes.length === 1 ? `**/*${suffixes[0]}` : `**/*{${suffixes.join(',')}}`;

        return glob
            .sync(pattern, { cwd: inputDir, absolute: true, nodir: true, ignore: ['**/node_modules/**'] })
            .sort();
    }
}
