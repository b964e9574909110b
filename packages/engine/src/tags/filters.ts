import { flatattrs } from '../lib/html.js';
import type { FilterFunction } from '../template/expression.js';

export const widgetFilters: Readonly<Record<string, FilterFunction>> = {
    flatattrs: value => flatattrs(value)
};
