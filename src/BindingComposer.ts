import * as path from 'path';
import { BindingEntry, BindingUnit, ComposedBinding, Diagnostic } from './interfaces/IBindingUnit';
import { IBindingComposer, IdentifierDeriver } from './interfaces/IBindingComposer';
import { IBindingTemplate } from './interfaces/IBindingTemplate';
import { STEP_KINDS, ScenarioDocument, StepKind, StepPhrase } from './interfaces/IScenarioDocument';
import { deriveIdentifier } from './utils/IdentifierUtils';

export const DEFAULT_SUFFIX = 'Steps';

export interface BindingComposerOptions {
    /** Appended to the identifier derived from the document's base name. */
    suffix: string;
}

interface Candidate {
    phrase: StepPhrase;
    name: string;
}

/**
 * Turns the step phrases of one document into a binding unit: phrases are
 * deduplicated per kind, named, de-collided and rendered through the template.
 */
export class BindingComposer implements IBindingComposer {
    constructor(
        private readonly template: IBindingTemplate,
        private readonly options: BindingComposerOptions = { suffix: DEFAULT_SUFFIX },
        private readonly derive: IdentifierDeriver = deriveIdentifier
    ) { }

    public compose(document: ScenarioDocument, phrases: readonly StepPhrase[]): ComposedBinding {
        const diagnostics: Diagnostic[] = [];
        const name = this.unitName(document.path);
        const groups = this.assignIdentifiers(this.dedupe(phrases), name, diagnostics);

        const unit: BindingUnit = {
            name,
            sourceName: path.basename(document.path),
            groups,
        };

        const renderedGroups = STEP_KINDS
            .filter(kind => groups[kind].length > 0)
            .map(kind => this.template.renderGroup(kind, groups[kind]));

        return {
            unit,
            fileName: `${unit.name}${this.template.fileExtension}`,
            source: this.template.renderUnit(unit, renderedGroups),
            diagnostics,
        };
    }

    public unitName(documentPath: string): string {
        const baseName = path.basename(documentPath, path.extname(documentPath));
        return `${this.derive(baseName)}${this.options.suffix}`;
    }

    /** First occurrence of each text wins, per kind, in document order. */
    private dedupe(phrases: readonly StepPhrase[]): Record<StepKind, StepPhrase[]> {
        const unique: Record<StepKind, StepPhrase[]> = { Given: [], When: [], Then: [] };
        const seen: Record<StepKind, Set<string>> = { Given: new Set(), When: new Set(), Then: new Set() };

        for (const phrase of phrases) {
            if (seen[phrase.kind].has(phrase.text)) continue;
            seen[phrase.kind].add(phrase.text);
            unique[phrase.kind].push(phrase);
        }
        return unique;
    }

    /**
     * Callable names are `<Kind><DerivedIdentifier>`. When distinct texts derive
     * the same name, the first keeps it and each later one takes the lowest
     * numeric suffix (from 2) that no other entry uses or derives. The unit's own
     * name is never handed to a member.
     */
    private assignIdentifiers(
        unique: Record<StepKind, StepPhrase[]>,
        unitName: string,
        diagnostics: Diagnostic[]
    ): Record<StepKind, BindingEntry[]> {
        const candidates: Candidate[] = STEP_KINDS.flatMap(kind =>
            unique[kind].map(phrase => ({ phrase, name: `${kind}${this.derive(phrase.text)}` }))
        );
        const derived = new Set(candidates.map(c => c.name));
        const owners = new Map<string, StepPhrase>();
        const taken = (identifier: string) => identifier === unitName || owners.has(identifier);
        const groups: Record<StepKind, BindingEntry[]> = { Given: [], When: [], Then: [] };

        for (const { phrase, name } of candidates) {
            let identifier = name;
            if (taken(name)) {
                let suffix = 2;
                while (derived.has(`${name}${suffix}`) || taken(`${name}${suffix}`)) {
                    suffix++;
                }
                identifier = `${name}${suffix}`;
                const owner = owners.get(name);
                diagnostics.push({
                    severity: 'info',
                    code: 'IdentifierCollision',
                    line: phrase.line,
                    message: owner
                        ? `"${phrase.text}" and "${owner.text}" both derive ${name}; using ${identifier}.`
                        : `"${phrase.text}" derives ${name}, the name of the unit itself; using ${identifier}.`,
                });
            }
            owners.set(identifier, phrase);
            groups[phrase.kind].push({ phrase, identifier });
        }
        return groups;
    }
}
