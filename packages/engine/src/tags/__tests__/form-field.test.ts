import { describe, it, expect, beforeEach } from 'vitest';
import { createBoundField, createTestEngine } from '../../__tests__/fixtures.js';
import { ConfigurationError, TemplateSyntaxError } from '../../lib/errors.js';
import type { TemplateEngine } from '../../template/engine.js';

describe('form_field', () => {
    let engine: TemplateEngine;

    beforeEach(() => {
        const created = createTestEngine();
        engine = created.engine;

        created.loader.register(engine.compile('forms/basic.html', t => [
            t.block('TextInput', [
                t.text('<input type="'), t.variable('inputType'),
                t.text('" name="'), t.variable('htmlName'),
                t.text('" value="'), t.variable('value|default:""'),
                t.text('"'), t.variable('widget.attrs|flatattrs'),
                t.text('>')
            ]),
            t.block('email', [t.text('<email-field id="'), t.variable('id'), t.text('">')]),
            t.block('Select', [
                t.text('<select name="'), t.variable('htmlName'), t.text('">'),
                t.for('choice', 'choices', [
                    t.text('<option value="'), t.variable('choice.value'), t.text('">'),
                    t.variable('choice.display'),
                    t.text('</option>')
                ]),
                t.text('</select>')
            ])
        ]));
    });

    function render(contents: string, values: Record<string, unknown>, alias = 'form'): string {
        return engine.compile('page.html', t => [
            t.tag('load_widgets', `${alias}="forms/basic.html"`),
            t.tag('form_field', contents)
        ]).render(values);
    }

    it('should pick the widget block from the field kinds', () => {
        const field = createBoundField({ name: 'username', value: 'ada', attrs: { maxlength: 10, required: true } });

        expect(render('field', { field })).toBe('<input type="text" name="username" value="ada" maxlength="10" required>');
    });

    it('should prefer a block named after the field over its widget kind', () => {
        const field = createBoundField({ name: 'email', widgetKind: 'EmailInput' });

        expect(render('field', { field })).toBe('<email-field id="id_email">');
    });

    it('should render wrapped choices', () => {
        const field = createBoundField({
            name: 'colour',
            fieldKind: 'ChoiceField',
            widgetKind: 'Select',
            choices: [['r', 'Red'], ['g', 'Green']],
            value: 'g'
        });

        expect(render('field', { field }))
            .toBe('<select name="colour"><option value="r">Red</option><option value="g">Green</option></select>');
    });

    it('should use an explicit widget reference', () => {
        const field = createBoundField({ name: 'username' });

        expect(render('field "form:email"', { field })).toBe('<email-field id="id_username">');
        expect(render('field widget="form:email"', { field })).toBe('<email-field id="id_username">');
    });

    it('should let keyword arguments override field data', () => {
        const field = createBoundField({ name: 'username', value: 'ada' });

        expect(render('field value="forced"', { field })).toBe('<input type="text" name="username" value="forced">');
    });

    it('should take the library from an alias override', () => {
        const field = createBoundField({ name: 'username', value: 'ada' });

        expect(render('field alias="alt"', { field }, 'alt')).toBe('<input type="text" name="username" value="ada">');
        expect(() => render('field', { field }, 'alt')).toThrow(ConfigurationError);
    });

    it('should reject a value that is not a bound field', () => {
        expect(() => render('field', { field: 'plain text' })).toThrow('form_field expects a bound form field, got field');
    });

    it.each([
        ['', 'form_field requires a field argument'],
        ['field "form:a" widget="form:b"', 'form_field received multiple values for argument "widget"'],
        ['field "form:a" extra', 'form_field received too many positional arguments'],
        ['field "nocolon"', 'widget name must be "alias:block_name" - nocolon']
    ])('should reject "%s" while compiling', (contents, message) => {
        expect(() => engine.compile('bad.html', t => [t.tag('form_field', contents)])).toThrow(TemplateSyntaxError);
        expect(() => engine.compile('bad.html', t => [t.tag('form_field', contents)])).toThrow(message);
    });
});
