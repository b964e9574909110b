import { describe, it, expect } from 'vitest';
import { BlockRegistry } from '../block-registry.js';
import { BlockNode, NodeList, TextNode } from '../../template/nodes.js';

function block(name: string, text: string): BlockNode {
    return new BlockNode(name, new NodeList([new TextNode(text)]));
}

describe('BlockRegistry', () => {
    describe('addLayer', () => {
        it('should keep the definition from the first layer that declares a name', () => {
            const childTitle = block('title', 'child');
            const parentTitle = block('title', 'parent');
            const footer = block('footer', 'footer');

            const registry = new BlockRegistry();
            registry.addLayer([['title', childTitle]]);
            registry.addLayer([['title', parentTitle], ['footer', footer]]);

            expect(registry.getBlock('title')?.body).toBe(childTitle);
            expect(registry.getBlock('footer')?.body).toBe(footer);
            expect(registry.size).toBe(2);
            expect(registry.names()).toEqual(['title', 'footer']);
        });

        it('should not add a layer twice', () => {
            const title = block('title', 'only');
            const registry = new BlockRegistry();

            registry.addLayer([['title', title]]);
            registry.addLayer([['title', title]]);

            expect(registry.chain('title')).toHaveLength(1);
        });

        it('should let the last entry for a name win inside one layer', () => {
            const first = block('title', 'first');
            const second = block('title', 'second');
            const registry = new BlockRegistry();

            registry.addLayer([['title', first], ['title', second]]);

            expect(registry.getBlock('title')?.body).toBe(second);
            expect(registry.chain('title')).toHaveLength(1);
        });

        it('should freeze definitions and record their depth', () => {
            const registry = new BlockRegistry();
            registry.addLayer([['title', block('title', 'a')]]);
            registry.addLayer([['title', block('title', 'b')]]);

            const [top, parent] = registry.chain('title');
            expect(Object.isFrozen(top)).toBe(true);
            expect(top.depth).toBe(0);
            expect(parent.depth).toBe(1);
        });
    });

    describe('getSuper', () => {
        it('should walk from the most specific definition to the root', () => {
            const grand = block('title', 'grand');
            const child = block('title', 'child');
            const base = block('title', 'base');

            const registry = new BlockRegistry();
            registry.addLayer([['title', grand]]);
            registry.addLayer([['title', child]]);
            registry.addLayer([['title', base]]);

            const top = registry.getBlock('title');
            expect(top?.body).toBe(grand);

            const second = top ? registry.getSuper(top) : undefined;
            expect(second?.body).toBe(child);

            const third = second ? registry.getSuper(second) : undefined;
            expect(third?.body).toBe(base);

            expect(third ? registry.getSuper(third) : 'unreachable').toBeUndefined();
        });

        it('should return undefined for a definition owned by another registry', () => {
            const registry = new BlockRegistry();
            registry.addLayer([['footer', block('footer', 'f')]]);
            registry.addLayer([['title', block('title', 'child')]]);
            registry.addLayer([['title', block('title', 'parent')]]);

            const other = new BlockRegistry();
            other.addLayer([['title', block('title', 'elsewhere')]]);
            const foreign = other.getBlock('title');

            expect(foreign).toBeDefined();
            expect(foreign ? registry.getSuper(foreign) : 'unreachable').toBeUndefined();
        });
    });

    it('should report unknown names as missing', () => {
        const registry = new BlockRegistry();

        expect(registry.has('title')).toBe(false);
        expect(registry.getBlock('title')).toBeUndefined();
        expect(registry.chain('title')).toEqual([]);
    });
});
