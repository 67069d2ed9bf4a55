import { IBindingTemplate, TemplateName } from '../interfaces/IBindingTemplate';
import { CSharpBindingTemplate } from './CSharpBindingTemplate';
import { TypeScriptBindingTemplate } from './TypeScriptBindingTemplate';

export { CSharpBindingTemplate, DEFAULT_NAMESPACE } from './CSharpBindingTemplate';
export { TypeScriptBindingTemplate } from './TypeScriptBindingTemplate';

export const TEMPLATE_NAMES: readonly TemplateName[] = ['csharp', 'typescript'];

export function createTemplate(name: TemplateName, namespace?: string): IBindingTemplate {
    switch (name) {
        case 'csharp':
            return new CSharpBindingTemplate(namespace);
        case 'typescript':
            return new TypeScriptBindingTemplate();
    }
}
