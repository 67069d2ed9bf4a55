import { ScenarioDocument } from "./IScenarioDocument";

export interface IDocumentReader {
    read(filePath: string): ScenarioDocument;
    findDocuments(inputDir: string, extensions: readonly string[]): string[];
}
