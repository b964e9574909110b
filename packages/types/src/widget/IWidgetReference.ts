/**
 * A parsed `alias:blockname` widget reference.
 *
 * An empty alias means "the library that is active where the reference is
 * rendered", which lets widgets call sibling blocks of their own library with
 * `:sibling` without repeating the alias.
 */
export interface IWidgetReference {
    readonly alias: string;
    readonly blockName: string;
}
