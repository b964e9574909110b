import type { IFieldData } from '@tessera/types';

export type FieldDataTransform = (data: IFieldData) => IFieldData;

const unchanged: FieldDataTransform = data => data;

const withInputType = (inputType: string): FieldDataTransform => data => ({ ...data, inputType });

const asMultiple: FieldDataTransform = data => ({ ...data, multiple: true });

/**
 * Adjustments keyed by field kind.
 */
export const FIELD_TRANSFORMS: ReadonlyMap<string, FieldDataTransform> = new Map([
    ['MultipleChoiceField', asMultiple],
    ['ModelMultipleChoiceField', asMultiple]
]);

/**
 * Adjustments keyed by widget kind.
 */
export const WIDGET_TRANSFORMS: ReadonlyMap<string, FieldDataTransform> = new Map([
    ['TextInput', withInputType('text')],
    ['EmailInput', withInputType('email')],
    ['NumberInput', withInputType('number')],
    ['PasswordInput', withInputType('password')],
    ['URLInput', withInputType('url')],
    ['HiddenInput', withInputType('hidden')],
    ['CheckboxInput', withInputType('checkbox')],
    ['SelectMultiple', asMultiple],
    ['CheckboxSelectMultiple', asMultiple]
]);

/**
 * Apply the field-kind transform, then the widget-kind transform. Unknown
 * kinds leave the data unchanged.
 */
export function applyKindTransforms(data: IFieldData): IFieldData {
    const afterField = (FIELD_TRANSFORMS.get(data.fieldType) ?? unchanged)(data);
    return (WIDGET_TRANSFORMS.get(afterField.widgetType) ?? unchanged)(afterField);
}
