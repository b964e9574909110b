import { vi } from 'vitest';
import type { ChoiceEntry, IBoundField, ILogger } from '@tessera/types';
import { TemplateEngine, type TemplateEngineOptions } from '../template/engine.js';
import { InMemoryTemplateLoader } from '../template/loader.js';

/**
 * Mock logger implementation for testing.
 */
export class MockLogger implements ILogger {
    public fatal = vi.fn();
    public error = vi.fn();
    public warn = vi.fn();
    public info = vi.fn();
    public debug = vi.fn();
    public trace = vi.fn();
    public child = vi.fn((_bindings: Record<string, unknown>): ILogger => this);
}

/**
 * Engine with an in-memory loader, a mock logger and fixed settings so tests
 * do not depend on the environment.
 */
export function createTestEngine(options: Partial<TemplateEngineOptions> = {}) {
    const loader = new InMemoryTemplateLoader();
    const logger = new MockLogger();
    const engine = new TemplateEngine({
        loader,
        logger,
        autoescape: true,
        strictVariables: false,
        formAlias: 'form',
        ...options
    });
    return { engine, loader, logger };
}

export interface BoundFieldOptions {
    name?: string;
    label?: string;
    fieldKind?: string;
    widgetKind?: string;
    attrs?: Record<string, unknown>;
    choices?: readonly ChoiceEntry[];
    required?: boolean;
    errors?: readonly string[];
    value?: unknown;
}

/**
 * Plain bound-field object shaped the way a host form library exposes one.
 */
export function createBoundField(options: BoundFieldOptions = {}): IBoundField {
    const name = options.name ?? 'username';
    const value = 'value' in options ? options.value : null;

    return {
        name,
        htmlName: name,
        autoId: `id_${name}`,
        idForLabel: `id_${name}`,
        label: options.label ?? name,
        helpText: '',
        cssClasses: '',
        errors: options.errors ?? [],
        form: null,
        field: {
            kind: options.fieldKind ?? 'CharField',
            widget: { kind: options.widgetKind ?? 'TextInput', attrs: options.attrs },
            required: options.required ?? true,
            choices: options.choices
        },
        value: () => value
    };
}
