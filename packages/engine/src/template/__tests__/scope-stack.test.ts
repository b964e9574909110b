import { describe, it, expect } from 'vitest';
import { ScopeError } from '../../lib/errors.js';
import { ScopeStack } from '../scope-stack.js';

describe('ScopeStack', () => {
    it('should shadow outer bindings until the frame is popped', () => {
        const stack = new ScopeStack<Record<string, unknown>>({ label: 'outer' });

        stack.push({ label: 'inner' });
        expect(stack.get('label')).toBe('inner');

        stack.pop();
        expect(stack.get('label')).toBe('outer');
    });

    it('should write to the top frame only', () => {
        const stack = new ScopeStack<Record<string, unknown>>();

        stack.push();
        stack.set('saved', 1);
        expect(stack.has('saved')).toBe(true);

        stack.pop();
        expect(stack.has('saved')).toBe(false);
    });

    it('should keep base-frame bindings after pushed frames are popped', () => {
        const stack = new ScopeStack<Record<string, unknown>>();

        stack.push();
        stack.setBase('table', 'kept');
        stack.pop();

        expect(stack.get('table')).toBe('kept');
    });

    it('should treat a key bound to undefined as present', () => {
        const stack = new ScopeStack<Record<string, unknown>>({ label: 'outer' });

        stack.push({ label: undefined });

        expect(stack.has('label')).toBe(true);
        expect(stack.get('label')).toBeUndefined();
    });

    it('should refuse to pop the base frame', () => {
        const stack = new ScopeStack<Record<string, unknown>>();

        expect(() => stack.pop()).toThrow(ScopeError);
        expect(() => stack.pop()).toThrow('pop() has been called more times than push()');
    });

    it('should pop a scoped frame when the callback throws', () => {
        const stack = new ScopeStack<Record<string, unknown>>({ label: 'outer' });

        expect(() => stack.scoped({ label: 'inner' }, () => {
            throw new Error('boom');
        })).toThrow('boom');

        expect(stack.depth).toBe(1);
        expect(stack.get('label')).toBe('outer');
    });

    it('should return the callback result from scoped', () => {
        const stack = new ScopeStack<Record<string, unknown>>();

        const result = stack.scoped({ label: 'inner' }, () => stack.get('label'));

        expect(result).toBe('inner');
        expect(stack.depth).toBe(1);
    });
});
