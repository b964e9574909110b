import { escapeHtml, markSafe, SafeString, toOutput } from '../lib/html.js';
import type { FilterFunction } from './expression.js';

/**
 * Filters every engine provides.
 */
export const builtinFilters: Readonly<Record<string, FilterFunction>> = {
    safe: value => markSafe(toOutput(value, false)),
    escape: value => new SafeString(escapeHtml(toOutput(value, false))),
    default: (value, fallback) => (value === undefined || value === null || value === '' ? fallback : value),
    join: (value, separator) => (Array.isArray(value) ? value.map(item => toOutput(item, false)).join(typeof separator === 'string' ? separator : ', ') : value)
};
