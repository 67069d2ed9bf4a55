import * as path from "path";
import { BindingComposer } from "./BindingComposer";
import { DocumentReader } from "./DocumentReader";
import { OutputWriter } from "./OutputWriter";
import { StepExtractor } from "./StepExtractor";
import { StepScaffoldError, WriteError, describeError } from "./errors";
import { Diagnostic } from "./interfaces/IBindingUnit";
import { IBindingComposer } from "./interfaces/IBindingComposer";
import { IDocumentReader } from "./interfaces/IDocumentReader";
import { ILogger } from "./interfaces/ILogger";
import { IOutputWriter } from "./interfaces/IOutputWriter";
import { DocumentOutcome, RunSummary } from "./interfaces/IRunSummary";
import { STEP_KINDS } from "./interfaces/IScenarioDocument";
import { IStepExtractor } from "./interfaces/IStepExtractor";
import { RunOptions } from "./interfaces/RunOptions";
import { createTemplate } from "./templates";
import { toPosixRelative } from "./utils/PathUtils";

export class App {
    constructor(
        private reader: IDocumentReader,
        private extractor: IStepExtractor,
        private composer: IBindingComposer,
        private writer: IOutputWriter,
        private logger: ILogger
    ) { }

    /**
     * Generates one binding unit per scenario document under options.inputDir.
     * Document failures are collected in the summary; only structural failures
     * (missing input directory, output root cannot be created) throw.
     */
    run(options: Pick<RunOptions, "inputDir" | "outputDir" | "extensions">): RunSummary {
        const inputDir = path.resolve(options.inputDir);
        const outputDir = path.resolve(options.outputDir);

        const files = this.reader.findDocuments(inputDir, options.extensions);
        this.writer.ensureRoot();

        if (!files.length) {
            this.logger.log(`No scenario documents found in ${inputDir}.`);
        } else {
            this.logger.log(`📂 Found ${files.length} scenario document(s) in ${inputDir}.`);
        }

        const summary: RunSummary = { succeeded: [], skipped: [], failed: [] };
        // output path -> document that produced it during this run
        const claimed = new Map<string, string>();

        for (const file of files) {
            const outcome = this.processDocument(file, inputDir, outputDir, claimed);
            summary[outcome.status].push(outcome);
        }

        this.reportSummary(summary, inputDir);
        return summary;
    }

    private processDocument(
        filePath: string,
        inputDir: string,
        outputDir: string,
        claimed: Map<string, string>
    ): DocumentOutcome {
        const relativePath = toPosixRelative(inputDir, filePath);
        this.logger.log(`📄 Processing: ${relativePath}`);
        const diagnostics: Diagnostic[] = [];

        try {
            const document = this.reader.read(filePath);
            const extraction = this.extractor.extract(document);
            diagnostics.push(...extraction.diagnostics);

            if (!extraction.phrases.length) {
                this.reportDiagnostics(relativePath, diagnostics);
                this.logger.log(`⏭️ No step phrases in ${relativePath}; skipped.`);
                return { path: filePath, status: "skipped", stubCount: 0, diagnostics };
            }

            const composed = this.composer.compose(document, extraction.phrases);
            diagnostics.push(...composed.diagnostics);
            this.reportDiagnostics(relativePath, diagnostics);

            const destinationDir = path.join(outputDir, path.dirname(path.relative(inputDir, filePath)));
            const outputPath = this.writer.outputPathFor(composed, destinationDir);
            const previous = claimed.get(outputPath);
            if (previous) {
                throw new WriteError(
                    `${toPosixRelative(outputDir, outputPath)} was already generated from ${toPosixRelative(inputDir, previous)}.`,
                    filePath
                );
            }
            claimed.set(outputPath, filePath);

            this.writer.write(composed, destinationDir);
            const stubCount = STEP_KINDS.reduce((count, kind) => count + composed.unit.groups[kind].length, 0);
            this.logger.log(`✅ ${relativePath} -> ${toPosixRelative(outputDir, outputPath)} (${stubCount} stubs)`);

            return { path: filePath, status: "succeeded", outputPath, stubCount, diagnostics };
        } catch (err) {
            const error = err instanceof Error ? err : new StepScaffoldError(describeError(err), filePath);
            this.logger.error(`❌ Failed: ${relativePath}`, error);
            return { path: filePath, status: "failed", stubCount: 0, diagnostics, error };
        }
    }

    private reportDiagnostics(relativePath: string, diagnostics: Diagnostic[]) {
        for (const d of diagnostics) {
            const location = d.line ? `${relativePath}:${d.line}` : relativePath;
            if (d.severity === "warning") {
                this.logger.warn(`⚠️ ${d.code} at ${location}: ${d.message}`);
            } else {
                this.logger.log(`ℹ️ ${d.code} at ${location}: ${d.message}`);
            }
        }
    }

    private reportSummary(summary: RunSummary, inputDir: string) {
        const { succeeded, skipped, failed } = summary;
        this.logger.log(
            `🧾 Summary: ${succeeded.length} succeeded, ${skipped.length} skipped, ${failed.length} failed.`
        );
        for (const outcome of skipped) {
            this.logger.log(`   skipped: ${toPosixRelative(inputDir, outcome.path)}`);
        }
        for (const outcome of failed) {
            this.logger.error(
                `   failed: ${toPosixRelative(inputDir, outcome.path)}: ${describeError(outcome.error)}`
            );
        }
    }
}

export function createApp(options: RunOptions, logger: ILogger): App {
    const template = createTemplate(options.template, options.namespace);
    return new App(
        new DocumentReader(),
        new StepExtractor({ continuation: options.continuation, language: options.language }),
        new BindingComposer(template, { suffix: options.suffix }),
        new OutputWriter({ outputRoot: options.outputDir, dryRun: options.dryRun }),
        logger
    );
}
