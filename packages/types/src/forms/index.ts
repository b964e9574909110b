/**
 * Contracts for the form-field glue.
 *
 * The form library itself is external; these interfaces describe only the
 * parts of a bound field the `form_field` directive reads.
 */

export type {
    ChoiceDisplay,
    ChoiceEntry,
    IBoundField,
    IFormField,
    IFormWidget
} from './IBoundField.js';
export type { IFieldData } from './IFieldData.js';
