import type { ITemplateLoader } from '@tessera/types';
import { TemplateNotFoundError } from '../lib/errors.js';
import type { Template } from './template.js';

/**
 * Template loader backed by a map of compiled templates.
 */
export class InMemoryTemplateLoader implements ITemplateLoader<Template> {
    private readonly templates = new Map<string, Template>();

    /**
     * Register a template under its name, replacing any previous one.
     */
    public register(template: Template): Template {
        this.templates.set(template.name, template);
        return template;
    }

    public has(name: string): boolean {
        return this.templates.has(name);
    }

    public getTemplate(name: string): Template {
        const template = this.templates.get(name);
        if (!template) {
            throw new TemplateNotFoundError(`Template not found: ${name}`, { name });
        }
        return template;
    }
}
