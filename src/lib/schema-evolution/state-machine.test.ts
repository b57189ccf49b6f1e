import { describe, expect, it } from 'vitest';
import { blocksDependents, transition } from './state-machine';

describe('migration state machine', () => {
    it('walks pending -> applying -> applied', () => {
        const applying = transition('pending', 'start');
        expect(applying).toBe('applying');
        expect(transition(applying, 'succeed')).toBe('applied');
    });

    it('moves pending straight to blocked', () => {
        expect(transition('pending', 'block')).toBe('blocked');
    });

    it('rejects transitions out of terminal states', () => {
        expect(() => transition('applied', 'start')).toThrow('Invalid migration transition: applied -> start');
        expect(() => transition('failed', 'succeed')).toThrow('Invalid migration transition: failed -> succeed');
    });

    it('never starts a blocked migration', () => {
        expect(() => transition('blocked', 'start')).toThrow('Invalid migration transition: blocked -> start');
    });

    it('only lets applied migrations unblock dependents', () => {
        expect(blocksDependents('applied')).toBe(false);
        expect(blocksDependents('failed')).toBe(true);
        expect(blocksDependents('blocked')).toBe(true);
        expect(blocksDependents(undefined)).toBe(true);
    });
});
