import { describe, it, expect, beforeEach } from 'vitest';
import { createTestEngine, MockLogger } from '../../../__tests__/fixtures.js';
import { BlockRegistry } from '../../../blocks/block-registry.js';
import { TemplateNotFoundError, TemplateSyntaxError } from '../../../lib/errors.js';
import { Context } from '../../../template/context.js';
import type { TemplateEngine } from '../../../template/engine.js';
import type { InMemoryTemplateLoader } from '../../../template/loader.js';
import { BlockNode, NodeList, TextNode } from '../../../template/nodes.js';
import { TemplateResolver } from '../template-resolver.service.js';

function block(name: string, text: string): BlockNode {
    return new BlockNode(name, new NodeList([new TextNode(text)]));
}

describe('TemplateResolver', () => {
    let engine: TemplateEngine;
    let loader: InMemoryTemplateLoader;
    let logger: MockLogger;
    let resolver: TemplateResolver;

    const baseX = block('x', 'base x');
    const baseY = block('y', 'base y');
    const middleX = block('x', 'middle x');
    const leafY = block('y', 'leaf y');
    const leafZ = block('z', 'leaf z');

    beforeEach(() => {
        ({ engine, loader } = createTestEngine());
        logger = new MockLogger();
        resolver = new TemplateResolver(logger);

        loader.register(engine.compile('base.html', () => [baseX, baseY]));
        loader.register(engine.compile('middle.html', t => [t.extends('"base.html"'), middleX]));
        loader.register(engine.compile('leaf.html', t => [t.extends('"middle.html"'), leafY, leafZ]));
    });

    it('should layer each ancestor below its child', () => {
        const registry = resolver.resolve('leaf.html', new Context(engine));

        expect(registry.names()).toEqual(['y', 'z', 'x']);
        expect(registry.chain('x').map(definition => definition.body)).toEqual([middleX, baseX]);
        expect(registry.chain('y').map(definition => definition.body)).toEqual([leafY, baseY]);
        expect(registry.getBlock('z')?.body).toBe(leafZ);
    });

    it('should accept a loaded template', () => {
        const registry = resolver.resolve(engine.getTemplate('middle.html'), new Context(engine));

        expect(registry.getBlock('x')?.body).toBe(middleX);
        expect(registry.getBlock('y')?.body).toBe(baseY);
    });

    it('should leave a registry unchanged when resolved into again', () => {
        const context = new Context(engine);
        const registry = resolver.resolve('leaf.html', context);

        expect(resolver.resolve('leaf.html', context, registry)).toBe(registry);
        expect(registry.chain('x')).toHaveLength(2);
        expect(registry.chain('y')).toHaveLength(2);
        expect(registry.size).toBe(3);
    });

    it('should fill a registry passed in', () => {
        const registry = new BlockRegistry();
        registry.addLayer([['x', block('x', 'override')]]);

        resolver.resolve('base.html', new Context(engine), registry);

        expect(registry.chain('x')).toHaveLength(2);
        expect(registry.chain('x')[1].body).toBe(baseX);
    });

    it('should log each resolved layer', () => {
        resolver.resolve('leaf.html', new Context(engine));

        expect(logger.debug).toHaveBeenCalledTimes(3);
        expect(logger.debug).toHaveBeenNthCalledWith(1, { template: 'leaf.html', blocks: 2, depth: 0 }, 'Resolved template blocks');
        expect(logger.debug).toHaveBeenNthCalledWith(3, { template: 'base.html', blocks: 2, depth: 2 }, 'Resolved template blocks');
    });

    it('should reject a template that extends itself', () => {
        loader.register(engine.compile('loop.html', t => [t.extends('"loop.html"')]));

        expect(() => resolver.resolve('loop.html', new Context(engine))).toThrow(TemplateSyntaxError);
        expect(() => resolver.resolve('loop.html', new Context(engine))).toThrow('Template "loop.html" extends itself');
    });

    it('should propagate a missing parent', () => {
        loader.register(engine.compile('orphan.html', t => [t.extends('"gone.html"')]));

        expect(() => resolver.resolve('orphan.html', new Context(engine))).toThrow(TemplateNotFoundError);
    });
});
