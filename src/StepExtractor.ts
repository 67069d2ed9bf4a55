import { dialects } from '@cucumber/gherkin';
import { Diagnostic } from './interfaces/IBindingUnit';
import { ScenarioDocument, StepKind, StepPhrase } from './interfaces/IScenarioDocument';
import { ContinuationPolicy, ExtractionResult, IStepExtractor } from './interfaces/IStepExtractor';

export const DEFAULT_LANGUAGE = 'en';

type GherkinDialect = (typeof dialects)[string];

interface StepKeyword {
    keyword: string;
    /** null for continuation keywords (And, But, *). */
    kind: StepKind | null;
}

interface KeywordTable {
    steps: StepKeyword[];
    /** Headers that open a new scenario block, with their trailing colon. */
    scenarioBlocks: string[];
    /** Headers that close the current block without opening a scenario. */
    containerBlocks: string[];
}

export interface StepExtractorOptions {
    continuation: ContinuationPolicy;
    language: string;
}

const LANGUAGE_HEADER = /^\s*#\s*language\s*:\s*(\S+)\s*$/;
const DOC_STRING_FENCES = ['"""', '```'];

export function isKnownLanguage(code: string): boolean {
    return Object.prototype.hasOwnProperty.call(dialects, code);
}

export class StepExtractor implements IStepExtractor {
    private readonly tables = new Map<string, KeywordTable>();

    constructor(
        private readonly options: StepExtractorOptions = { continuation: 'ignore', language: DEFAULT_LANGUAGE }
    ) { }

    public extract(document: ScenarioDocument): ExtractionResult {
        const lines = document.rawText.split(/\r?\n/);
        const diagnostics: Diagnostic[] = [];
        const language = this.resolveLanguage(lines, diagnostics);
        const table = this.keywordTable(language);

        const phrases: StepPhrase[] = [];
        let scenarioIndex = -1;
        let currentKind: StepKind | null = null;
        let openFence: string | null = null;

        lines.forEach((rawLine, index) => {
            const lineNumber = index + 1;
            const line = rawLine.trim();

            if (openFence) {
                if (line.startsWith(openFence)) openFence = null;
                return;
            }
            const fence = DOC_STRING_FENCES.find(f => line.startsWith(f));
            if (fence) {
                openFence = fence;
                return;
            }
            if (line.length === 0 || line.startsWith('#') || line.startsWith('|')) return;

            if (table.scenarioBlocks.some(header => line.startsWith(header))) {
                scenarioIndex++;
                currentKind = null;
                return;
            }
            if (table.containerBlocks.some(header => line.startsWith(header))) {
                currentKind = null;
                return;
            }

            for (const { keyword, kind } of table.steps) {
                const text = matchKeyword(line, keyword);
                if (text === undefined) continue;

                const keywordText = keyword.trim();
                if (kind === null && currentKind === null) {
                    diagnostics.push({
                        severity: 'warning',
                        code: 'ParseAmbiguity',
                        line: lineNumber,
                        message: `'${keywordText}' step has no preceding Given/When/Then in its scenario; line ignored.`,
                    });
                    return;
                }
                if (text.length === 0) {
                    diagnostics.push({
                        severity: 'warning',
                        code: 'ParseAmbiguity',
                        line: lineNumber,
                        message: `'${keywordText}' step has no text; line ignored.`,
                    });
                    return;
                }

                if (kind !== null) {
                    currentKind = kind;
                    phrases.push({ kind, text, originScenarioIndex: scenarioIndex, line: lineNumber });
                } else if (currentKind !== null && this.options.continuation === 'inherit') {
                    phrases.push({ kind: currentKind, text, originScenarioIndex: scenarioIndex, line: lineNumber });
                }
                return;
            }
        });

        return { phrases, diagnostics, language };
    }

    private resolveLanguage(lines: string[], diagnostics: Diagnostic[]): string {
        for (let i = 0; i < lines.length; i++) {
            const line = lines[i].trim();
            if (line.length === 0) continue;
            if (!line.startsWith('#')) break;

            const match = LANGUAGE_HEADER.exec(line);
            if (!match) continue;
            if (isKnownLanguage(match[1])) return match[1];

            diagnostics.push({
                severity: 'warning',
                code: 'ParseAmbiguity',
                line: i + 1,
                message: `Unknown language '${match[1]}'; using '${this.options.language}' keywords.`,
            });
            break;
        }
        return this.options.language;
    }

    private keywordTable(language: string): KeywordTable {
        let table = this.tables.get(language);
        if (!table) {
            const dialect = dialects[language] ?? dialects[DEFAULT_LANGUAGE];
            table = buildKeywordTable(dialect);
            this.tables.set(language, table);
        }
        return table;
    }
}

function buildKeywordTable(dialect: GherkinDialect): KeywordTable {
    const steps: StepKeyword[] = [];
    const add = (keywords: readonly string[], kind: StepKind | null) => {
        for (const keyword of keywords) {
            // '*' is listed under every step kind; it only ever continues one
            if (keyword.trim() === '*') continue;
            if (!steps.some(s => s.keyword === keyword)) {
                steps.push({ keyword, kind });
            }
        }
    };

    add(dialect.given, 'Given');
    add(dialect.when, 'When');
    add(dialect.then, 'Then');
    add(dialect.and, null);
    add(dialect.but, null);
    steps.push({ keyword: '* ', kind: null });
    steps.sort((a, b) => b.keyword.length - a.keyword.length);

    const headers = (keywords: readonly string[]) =>
        keywords.map(k => `${k}:`).sort((a, b) => b.length - a.length);

    return {
        steps,
        scenarioBlocks: headers([...dialect.background, ...dialect.scenario, ...dialect.scenarioOutline]),
        containerBlocks: headers([...dialect.feature, ...dialect.rule, ...dialect.examples]),
    };
}

/**
 * Returns the trimmed step text when the line opens with the keyword, undefined
 * otherwise. Keywords ending in a space must be followed by whitespace or end
 * the line, so that "Butter" never reads as "But ter".
 */
function matchKeyword(line: string, keyword: string): string | undefined {
    const bare = keyword.trimEnd();
    if (!line.startsWith(bare)) return undefined;

    const rest = line.slice(bare.length);
    if (bare !== keyword && rest.length > 0 && !/^\s/.test(rest)) return undefined;
    return rest.trim();
}
