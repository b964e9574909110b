import type { IBoundField } from '@tessera/types';

/**
 * Candidate widget block names for a field, most specific first.
 *
 * Combines the field kind, widget kind and field name so a library can style
 * one particular field, all fields of a kind with a given widget, or fall
 * back to a generic block per widget or field kind.
 *
 * @example
 * autoWidget(emailField);
 * // ['CharField_EmailInput_email', 'CharField_email', 'EmailInput_email',
 * //  'CharField_EmailInput', 'email', 'EmailInput', 'CharField']
 */
export function autoWidget(boundField: IBoundField): string[] {
    const field = boundField.field.kind;
    const widget = boundField.field.widget.kind;
    const name = boundField.name;

    return [
        `${field}_${widget}_${name}`,
        `${field}_${name}`,
        `${widget}_${name}`,
        `${field}_${widget}`,
        name,
        widget,
        field
    ];
}
