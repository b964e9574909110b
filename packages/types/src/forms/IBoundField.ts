/**
 * Display side of a choice: a label, or a labelled group of nested choices.
 */
export type ChoiceDisplay = string | readonly ChoiceEntry[];

/**
 * One `[value, display]` pair from a choice field.
 */
export type ChoiceEntry = readonly [unknown, ChoiceDisplay];

/**
 * Widget metadata of a form field.
 *
 * `kind` names the widget implementation (for example `TextInput` or
 * `SelectMultiple`) and drives automatic widget-name derivation.
 */
export interface IFormWidget {
    readonly kind: string;
    readonly attrs?: Readonly<Record<string, unknown>>;
}

/**
 * Field metadata of a form field, independent of any bound data.
 */
export interface IFormField {
    /**
     * Field implementation name, such as `CharField` or `ChoiceField`.
     */
    readonly kind: string;
    readonly widget: IFormWidget;
    readonly required?: boolean;
    readonly choices?: readonly ChoiceEntry[];
}

/**
 * A form field bound to a form instance, as exposed by the host form library.
 *
 * Only read by the `form_field` directive, which turns it into template
 * variables and picks a widget block from its kinds and name.
 */
export interface IBoundField {
    readonly name: string;
    readonly htmlName: string;
    readonly autoId: string;
    readonly idForLabel: string;
    readonly label: string;
    readonly helpText: string;
    readonly cssClasses: string;
    readonly errors: readonly string[];
    readonly form: unknown;
    readonly field: IFormField;

    /**
     * Current value: bound data when the form is bound, else the initial value.
     */
    value(): unknown;
}
