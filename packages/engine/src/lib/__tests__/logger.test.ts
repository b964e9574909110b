import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { createLogger, PinoLogger } from '../logger.js';

describe('PinoLogger', () => {
    let lines: unknown[];
    let logger: PinoLogger;

    beforeEach(() => {
        lines = [];
        const destination = {
            write: (line: string) => {
                lines.push(JSON.parse(line));
            }
        };
        logger = new PinoLogger(pino({ level: 'debug', base: null }, destination));
    });

    it('should write bindings and message', () => {
        logger.info({ alias: 'form' }, 'Loaded widget library');

        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({ level: 30, alias: 'form', msg: 'Loaded widget library' });
    });

    it('should accept a bare message', () => {
        logger.warn('Widget lookup failed');

        expect(lines[0]).toMatchObject({ level: 40, msg: 'Widget lookup failed' });
    });

    it('should carry child bindings', () => {
        logger.child({ component: 'template-engine' }).debug({ template: 'a.html' }, 'Resolved template blocks');

        expect(lines[0]).toMatchObject({ level: 20, component: 'template-engine', template: 'a.html' });
    });

    it('should drop records below the level', () => {
        logger.trace('hidden');

        expect(lines).toHaveLength(0);
    });
});

describe('createLogger', () => {
    it('should honour an explicit level', () => {
        expect(createLogger({ level: 'warn', pretty: false }).level).toBe('warn');
    });
});
