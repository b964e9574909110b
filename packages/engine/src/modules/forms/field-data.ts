import type { ChoiceEntry, IBoundField, IFieldData } from '@tessera/types';
import { ChoiceWrapper, toText } from './choice-wrapper.js';
import { applyKindTransforms } from './kind-transforms.js';

/**
 * Normalize a field value the way select widgets compare it: `null` stays
 * `null`, lists become lists of strings, anything else becomes a string.
 */
export function normalizeValue(value: unknown): string | readonly string[] | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (Array.isArray(value)) {
        return value.map(toText);
    }
    return toText(value);
}

/**
 * Display text of the top-level choice whose value is `value`, or empty.
 */
export function choiceDisplay(choices: readonly ChoiceEntry[], value: unknown): unknown {
    const match = choices.find(([key]) => key === value);
    return match ? match[1] : '';
}

/**
 * Variables for rendering one bound field through its widget block.
 *
 * Reads the field's metadata, runs the kind transforms, normalizes the value
 * and wraps choices. `overrides` are applied last and win over everything
 * derived from the field.
 *
 * Multi-valued choice fields get no `display`.
 */
export function buildFieldData(boundField: IBoundField, overrides: Readonly<Record<string, unknown>> = {}): Record<string, unknown> {
    const { field } = boundField;

    const data = applyKindTransforms({
        formField: boundField,
        id: boundField.autoId,
        widgetType: field.widget.kind,
        fieldType: field.kind,
        cssClasses: boundField.cssClasses,
        errors: boundField.errors,
        field,
        form: boundField.form,
        helpText: boundField.helpText,
        htmlName: boundField.htmlName,
        idForLabel: boundField.idForLabel,
        label: boundField.label,
        name: boundField.name,
        choices: field.choices ?? null,
        widget: field.widget,
        required: field.required ?? null
    });

    const value = boundField.value();
    const scope: Record<string, unknown> = { ...data };

    if (data.choices && data.choices.length > 0) {
        if (!Array.isArray(value)) {
            scope.display = choiceDisplay(field.choices ?? [], value);
        }
        scope.choices = ChoiceWrapper.wrap(data.choices);
    }

    scope.value = normalizeValue(value);

    return { ...scope, ...overrides };
}
