import { ScopeError } from '../lib/errors.js';

/**
 * Stack of binding frames with lexical shadowing.
 *
 * Lookups walk from the top frame down; writes go to the top frame. The base
 * frame can never be popped, so a stack always has somewhere to write.
 *
 * @typeParam T - Shape of the bindings a frame may hold
 */
export class ScopeStack<T extends object> {
    private readonly frames: Partial<T>[];

    constructor(base: Partial<T> = {}) {
        this.frames = [{ ...base }];
    }

    public get depth(): number {
        return this.frames.length;
    }

    public get<K extends keyof T>(key: K): T[K] | undefined {
        for (let i = this.frames.length - 1; i >= 0; i -= 1) {
            const frame = this.frames[i];
            if (Object.prototype.hasOwnProperty.call(frame, key)) {
                return frame[key];
            }
        }
        return undefined;
    }

    public has<K extends keyof T>(key: K): boolean {
        return this.frames.some(frame => Object.prototype.hasOwnProperty.call(frame, key));
    }

    public set<K extends keyof T>(key: K, value: T[K]): void {
        this.frames[this.frames.length - 1][key] = value;
    }

    /**
     * Bind `key` in the base frame, below every pushed frame.
     */
    public setBase<K extends keyof T>(key: K, value: T[K]): void {
        this.frames[0][key] = value;
    }

    public push(frame: Partial<T> = {}): void {
        this.frames.push({ ...frame });
    }

    public pop(): Partial<T> {
        if (this.frames.length === 1) {
            throw new ScopeError('pop() has been called more times than push()');
        }
        return this.frames.pop() ?? {};
    }

    /**
     * Run `fn` with `frame` pushed, popping it again however `fn` exits.
     */
    public scoped<R>(frame: Partial<T>, fn: () => R): R {
        this.push(frame);
        try {
            return fn();
        } finally {
            this.pop();
        }
    }
}
