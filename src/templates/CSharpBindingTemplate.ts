import { BindingEntry, BindingUnit } from '../interfaces/IBindingUnit';
import { IBindingTemplate } from '../interfaces/IBindingTemplate';
import { StepKind } from '../interfaces/IScenarioDocument';
import { escapeRegExp, toVerbatimString } from '../utils/PatternUtils';

export const DEFAULT_NAMESPACE = 'Acceptance.Steps';

const INDENT = '    ';

/**
 * SpecFlow-style binding class. SpecFlow anchors step patterns itself, so the
 * escaped text goes into the attribute as-is.
 */
export class CSharpBindingTemplate implements IBindingTemplate {
    public readonly name = 'csharp';
    public readonly fileExtension = '.cs';

    constructor(private readonly namespace: string = DEFAULT_NAMESPACE) { }

    public renderUnit(unit: BindingUnit, renderedGroups: string[]): string {
        const lines = [
            `// Step binding stubs for ${unit.sourceName}.`,
            'using TechTalk.SpecFlow;',
            '',
            `namespace ${this.namespace}`,
            '{',
            `${INDENT}[Binding]`,
            `${INDENT}public class ${unit.name}`,
            `${INDENT}{`,
        ];
        if (renderedGroups.length > 0) {
            lines.push(renderedGroups.join('\n\n'));
        }
        lines.push(`${INDENT}}`, '}', '');
        return lines.join('\n');
    }

    public renderGroup(kind: StepKind, entries: readonly BindingEntry[]): string {
        const stubs = entries.map(entry => this.renderStub(kind, entry)).join('\n\n');
        return [`${INDENT}${INDENT}#region ${kind}`, '', stubs, '', `${INDENT}${INDENT}#endregion`].join('\n');
    }

    public renderStub(kind: StepKind, entry: BindingEntry): string {
        const pad = INDENT.repeat(2);
        const pattern = toVerbatimString(escapeRegExp(entry.phrase.text));
        return [
            `${pad}[${kind}(@"${pattern}")]`,
            `${pad}public void ${entry.identifier}()`,
            `${pad}{`,
            `${pad}${INDENT}throw new PendingStepException();`,
            `${pad}}`,
        ].join('\n');
    }
}
