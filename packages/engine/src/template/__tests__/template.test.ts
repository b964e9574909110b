import { describe, it, expect, beforeEach } from 'vitest';
import { createTestEngine } from '../../__tests__/fixtures.js';
import { TemplateNotFoundError, TemplateSyntaxError } from '../../lib/errors.js';
import type { TemplateEngine } from '../engine.js';
import type { InMemoryTemplateLoader } from '../loader.js';

describe('Template', () => {
    let engine: TemplateEngine;
    let loader: InMemoryTemplateLoader;

    beforeEach(() => {
        ({ engine, loader } = createTestEngine());

        loader.register(engine.compile('base.html', t => [
            t.text('<h1>'),
            t.block('title', [t.text('Base')]),
            t.text('</h1>'),
            t.block('body', [t.text('base body')])
        ]));
    });

    describe('inheritance', () => {
        it('should render the root ancestor with the most specific blocks', () => {
            loader.register(engine.compile('child.html', t => [
                t.extends('"base.html"'),
                t.block('title', [t.text('Child+'), t.variable('block.super')])
            ]));
            loader.register(engine.compile('grand.html', t => [
                t.extends('"child.html"'),
                t.block('title', [t.text('Grand+'), t.variable('block.super')]),
                t.text('outside any block')
            ]));

            expect(engine.render('grand.html')).toBe('<h1>Grand+Child+Base</h1>base body');
        });

        it('should resolve the parent from a variable', () => {
            loader.register(engine.compile('page.html', t => [
                t.extends('layout'),
                t.block('body', [t.text('page body')])
            ]));

            expect(engine.render('page.html', { layout: 'base.html' })).toBe('<h1>Base</h1>page body');
            expect(engine.render('page.html', { layout: engine.getTemplate('base.html') })).toBe('<h1>Base</h1>page body');
        });

        it('should render block.super as empty when nothing is overridden', () => {
            loader.register(engine.compile('solo.html', t => [
                t.block('title', [t.text('['), t.variable('block.super'), t.text(']')])
            ]));

            expect(engine.render('solo.html')).toBe('[]');
        });

        it('should reject a chain that extends itself', () => {
            loader.register(engine.compile('a.html', t => [t.extends('"b.html"')]));
            loader.register(engine.compile('b.html', t => [t.extends('"a.html"')]));

            expect(() => engine.render('a.html')).toThrow(TemplateSyntaxError);
            expect(() => engine.render('a.html')).toThrow('Template "a.html" extends itself');
        });

        it('should reject a parent that is not a template or a name', () => {
            loader.register(engine.compile('numbered.html', t => [t.extends('42')]));

            expect(() => engine.render('numbered.html')).toThrow('Expected a template or template name, got 42');
        });

        it('should propagate missing templates', () => {
            expect(() => engine.render('missing.html')).toThrow(TemplateNotFoundError);
            expect(() => engine.render('missing.html')).toThrow('Template not found: missing.html');
        });
    });

    describe('blocks', () => {
        it('should list nested blocks as local blocks', () => {
            const template = engine.compile('nested.html', t => [
                t.block('outer', [t.block('inner', [t.text('x')])]),
                t.if('flag', [t.block('hidden')])
            ]);

            expect(Array.from(template.localBlocks().keys())).toEqual(['outer', 'inner']);
        });

        it('should render a block no registry knows from its own body', () => {
            const template = engine.compile('conditional.html', t => [
                t.if('show', [t.block('inner', [t.text('I')])])
            ]);

            expect(template.render({ show: true })).toBe('I');
        });
    });

    describe('output', () => {
        it('should escape variables unless marked safe', () => {
            const template = engine.compile('escape.html', t => [
                t.variable('text'),
                t.text('|'),
                t.variable('text|safe')
            ]);

            expect(template.render({ text: '<b>"x"</b>' })).toBe('&lt;b&gt;&quot;x&quot;&lt;/b&gt;|<b>"x"</b>');
        });

        it('should not escape when autoescape is off', () => {
            const raw = createTestEngine({ autoescape: false }).engine;
            const template = raw.compile('raw.html', t => [t.variable('text')]);

            expect(template.render({ text: '<b>' })).toBe('<b>');
        });

        it('should render null and undefined as empty', () => {
            const template = engine.compile('empty.html', t => [t.variable('nothing'), t.variable('missing')]);

            expect(template.render({ nothing: null })).toBe('');
        });
    });

    describe('control flow', () => {
        it('should loop with loop metadata', () => {
            const template = engine.compile('loop.html', t => [
                t.for('item', 'items', [
                    t.variable('loop.index'),
                    t.text(':'),
                    t.variable('item'),
                    t.if('loop.last', [], [t.text(',')])
                ], [t.text('none')])
            ]);

            expect(template.render({ items: ['a', 'b'] })).toBe('1:a,2:b');
            expect(template.render({ items: [] })).toBe('none');
        });

        it('should treat empty collections as false', () => {
            const template = engine.compile('if.html', t => [
                t.if('items', [t.text('yes')], [t.text('no')])
            ]);

            expect(template.render({ items: [] })).toBe('no');
            expect(template.render({ items: new Map([['k', 1]]) })).toBe('yes');
        });
    });
});
