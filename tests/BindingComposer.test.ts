import { describe, it } from 'node:test';
import * as assert from 'assert';
import { BindingComposer } from '../src/BindingComposer';
import { StepExtractor } from '../src/StepExtractor';
import { CSharpBindingTemplate } from '../src/templates';
import { ScenarioDocument, StepKind, StepPhrase } from '../src/interfaces/IScenarioDocument';
import { LOGIN_FEATURE } from './helpers';

const document: ScenarioDocument = { path: '/features/checkout-flow.feature', rawText: '' };

let line = 0;
function phrase(kind: StepKind, text: string, originScenarioIndex = 0): StepPhrase {
    line++;
    return { kind, text, originScenarioIndex, line };
}

function identifiers(composer: BindingComposer, phrases: StepPhrase[]) {
    const { unit } = composer.compose(document, phrases);
    return {
        Given: unit.groups.Given.map(e => e.identifier),
        When: unit.groups.When.map(e => e.identifier),
        Then: unit.groups.Then.map(e => e.identifier),
    };
}

describe('BindingComposer', () => {
    const composer = new BindingComposer(new CSharpBindingTemplate());

    it('produces one stub per unique step of the login feature (five, not six)', () => {
        const login: ScenarioDocument = { path: '/features/login.feature', rawText: LOGIN_FEATURE };
        const { phrases } = new StepExtractor().extract(login);
        const { unit, fileName } = composer.compose(login, phrases);

        assert.strictEqual(unit.name, 'LoginSteps');
        assert.strictEqual(unit.sourceName, 'login.feature');
        assert.strictEqual(fileName, 'LoginSteps.cs');
        assert.deepStrictEqual(unit.groups.Given.map(e => e.phrase.text), ['the user is on the login page']);
        assert.deepStrictEqual(unit.groups.When.map(e => e.identifier), [
            'WhenTheUserEntersValidCredentials',
            'WhenTheUserEntersInvalidCredentials',
        ]);
        assert.deepStrictEqual(unit.groups.Then.map(e => e.identifier), [
            'ThenTheUserShouldBeRedirectedToTheDashboard',
            'ThenAnErrorMessageShouldBeDisplayed',
        ]);
    });

    it('keeps the first occurrence of repeated text within a kind', () => {
        const first = phrase('Given', 'a user', 0);
        const { unit } = composer.compose(document, [first, phrase('When', 'I log in'), phrase('Given', 'a user', 3)]);

        assert.strictEqual(unit.groups.Given.length, 1);
        assert.strictEqual(unit.groups.Given[0].phrase, first);
    });

    it('keeps identical text under different kinds apart', () => {
        const result = identifiers(composer, [phrase('Given', 'the page loads'), phrase('Then', 'the page loads')]);
        assert.deepStrictEqual(result, {
            Given: ['GivenThePageLoads'],
            When: [],
            Then: ['ThenThePageLoads'],
        });
    });

    it('suffixes colliding identifiers in order of first occurrence', () => {
        const { unit, diagnostics } = composer.compose(document, [
            phrase('When', 'I save'),
            phrase('When', 'I save!'),
            phrase('When', 'I-save'),
        ]);

        assert.deepStrictEqual(unit.groups.When.map(e => [e.phrase.text, e.identifier]), [
            ['I save', 'WhenISave'],
            ['I save!', 'WhenISave2'],
            ['I-save', 'WhenISave3'],
        ]);
        assert.deepStrictEqual(diagnostics.map(d => [d.severity, d.code, d.message]), [
            ['info', 'IdentifierCollision', '"I save!" and "I save" both derive WhenISave; using WhenISave2.'],
            ['info', 'IdentifierCollision', '"I-save" and "I save" both derive WhenISave; using WhenISave3.'],
        ]);
    });

    it('never hands out a suffixed name another step derives on its own', () => {
        const result = identifiers(composer, [
            phrase('Then', 'item 2'),
            phrase('Then', 'item'),
            phrase('Then', 'item!'),
            phrase('Then', 'item 3'),
        ]);
        assert.deepStrictEqual(result.Then, ['ThenItem2', 'ThenItem', 'ThenItem4', 'ThenItem3']);
    });

    it('gives every entry of the unit a distinct identifier', () => {
        const texts = ['a b', 'a-b', 'ab', 'A B', 'a_b', 'AB', '', '?'];
        const phrases = texts.flatMap(text => [phrase('Given', text), phrase('Then', text)]);
        const { unit } = composer.compose(document, phrases);

        const all = [...unit.groups.Given, ...unit.groups.When, ...unit.groups.Then].map(e => e.identifier);
        assert.strictEqual(new Set(all).size, all.length);
        assert.strictEqual(all.length, texts.length * 2);
    });

    it('never names a member after the unit itself', () => {
        const named: ScenarioDocument = { path: '/features/given a.feature', rawText: '' };
        const { unit, diagnostics } = composer.compose(named, [phrase('Given', 'a steps')]);

        assert.strictEqual(unit.name, 'GivenASteps');
        assert.deepStrictEqual(unit.groups.Given.map(e => e.identifier), ['GivenASteps2']);
        assert.deepStrictEqual(diagnostics.map(d => d.message), [
            '"a steps" derives GivenASteps, the name of the unit itself; using GivenASteps2.',
        ]);
    });

    it('names units and stubs of a Cyrillic document after their text', () => {
        const russian: ScenarioDocument = {
            path: '/features/вход.feature',
            rawText: [
                '# language: ru',
                'Функция: Вход',
                '  Сценарий: Успешный вход',
                '    Дано пользователь на странице входа',
                '    Когда он вводит верный пароль',
                '    Тогда он видит панель',
            ].join('\n'),
        };
        const { phrases } = new StepExtractor().extract(russian);
        const { unit, fileName } = composer.compose(russian, phrases);

        assert.strictEqual(unit.name, 'ВходSteps');
        assert.strictEqual(fileName, 'ВходSteps.cs');
        assert.deepStrictEqual(identifiers(composer, phrases), {
            Given: ['GivenПользовательНаСтраницеВхода'],
            When: ['WhenОнВводитВерныйПароль'],
            Then: ['ThenОнВидитПанель'],
        });
    });

    it('derives the unit name from the document base name and suffix', () => {
        const custom = new BindingComposer(new CSharpBindingTemplate(), { suffix: 'Bindings' });
        assert.strictEqual(custom.unitName('/a/b/checkout-flow.feature'), 'CheckoutFlowBindings');
        assert.strictEqual(composer.unitName('/a/b/2fa setup.feature'), 'Step2faSetupSteps');
    });

    it('uses the injected identifier deriver', () => {
        const upper = new BindingComposer(new CSharpBindingTemplate(), { suffix: '' }, text => text.replace(/\W/g, '').toUpperCase());
        const { unit } = upper.compose(document, [phrase('Given', 'go now')]);

        assert.strictEqual(unit.name, 'CHECKOUTFLOW');
        assert.strictEqual(unit.groups.Given[0].identifier, 'GivenGONOW');
    });

    it('is byte-stable across repeated composition', () => {
        const phrases = [phrase('Given', 'x'), phrase('When', 'y'), phrase('Then', 'z')];
        assert.strictEqual(composer.compose(document, phrases).source, composer.compose(document, phrases).source);
    });
});
