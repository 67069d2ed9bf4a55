import { BindingEntry, BindingUnit } from '../interfaces/IBindingUnit';
import { IBindingTemplate } from '../interfaces/IBindingTemplate';
import { STEP_KINDS, StepKind } from '../interfaces/IScenarioDocument';
import { escapeRegExp, toRegExpLiteralBody } from '../utils/PatternUtils';

const INDENT = '  ';

// cucumber-tsflow decorator per step kind
const DECORATORS: Record<StepKind, string> = {
    Given: 'given',
    When: 'when',
    Then: 'then',
};

/**
 * cucumber-tsflow binding class. Patterns are anchored regular expressions so
 * a stub only ever matches its own step text.
 */
export class TypeScriptBindingTemplate implements IBindingTemplate {
    public readonly name = 'typescript';
    public readonly fileExtension = '.ts';

    public renderUnit(unit: BindingUnit, renderedGroups: string[]): string {
        const imports = ['binding', ...STEP_KINDS.filter(kind => unit.groups[kind].length > 0).map(kind => DECORATORS[kind])];
        const lines = [
            `// Step binding stubs for ${unit.sourceName}.`,
            `import { ${imports.join(', ')} } from "cucumber-tsflow";`,
            '',
            '@binding()',
            `export class ${unit.name} {`,
        ];
        if (renderedGroups.length > 0) {
            lines.push(renderedGroups.join('\n\n'));
        }
        lines.push('}', '');
        return lines.join('\n');
    }

    public renderGroup(kind: StepKind, entries: readonly BindingEntry[]): string {
        const stubs = entries.map(entry => this.renderStub(kind, entry)).join('\n\n');
        return [`${INDENT}// ${kind}`, '', stubs].join('\n');
    }

    public renderStub(kind: StepKind, entry: BindingEntry): string {
        const pattern = toRegExpLiteralBody(escapeRegExp(entry.phrase.text));
        return [
            `${INDENT}@${DECORATORS[kind]}(/^${pattern}$/)`,
            `${INDENT}public ${entry.identifier}(): string {`,
            `${INDENT}${INDENT}return "pending";`,
            `${INDENT}}`,
        ].join('\n');
    }
}
