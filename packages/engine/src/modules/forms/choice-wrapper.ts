import type { ChoiceEntry } from '@tessera/types';

export type WrappedDisplay = string | readonly ChoiceWrapper[];

/**
 * A choice as seen by widget templates: its value as text and its display,
 * which is either a label or a group of nested choices.
 *
 * Templates branch on `choice.isGroup` to render `<optgroup>` versus `<option>`.
 */
export class ChoiceWrapper {
    constructor(public readonly value: string, public readonly display: WrappedDisplay) {
        Object.freeze(this);
    }

    public get isGroup(): boolean {
        return typeof this.display !== 'string';
    }

    public equals(other: ChoiceWrapper): boolean {
        if (this.value !== other.value) {
            return false;
        }
        if (typeof this.display === 'string' || typeof other.display === 'string') {
            return this.display === other.display;
        }
        const mine = this.display;
        const theirs = other.display;
        return mine.length === theirs.length && mine.every((choice, index) => choice.equals(theirs[index]));
    }

    /**
     * Wrap `[value, display]` entries, wrapping grouped entries recursively.
     */
    public static wrap(choices: readonly ChoiceEntry[]): ChoiceWrapper[] {
        return choices.map(([value, display]) => new ChoiceWrapper(
            toText(value),
            typeof display === 'string' ? display : ChoiceWrapper.wrap(display)
        ));
    }
}

/**
 * Text form of a value as it appears in rendered HTML.
 */
export function toText(value: unknown): string {
    return value === null || value === undefined ? '' : String(value);
}
