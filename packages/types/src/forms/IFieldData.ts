import type { ChoiceEntry, IBoundField, IFormField, IFormWidget } from './IBoundField.js';

/**
 * Field metadata handed to the kind transforms before the value and choices
 * are normalized.
 *
 * Transforms may add keys (for example `inputType` or `multiple`), so the
 * shape stays open.
 */
export interface IFieldData {
    formField: IBoundField;
    id: string;
    widgetType: string;
    fieldType: string;
    cssClasses: string;
    errors: readonly string[];
    field: IFormField;
    form: unknown;
    helpText: string;
    htmlName: string;
    idForLabel: string;
    label: string;
    name: string;
    choices: readonly ChoiceEntry[] | null;
    widget: IFormWidget;
    required: boolean | null;

    [key: string]: unknown;
}
