import { describe, expect, it, vi } from 'vitest';

import { LogStore, type ConsoleSink } from '../logStore';

const createSink = () => ({
    info: vi.fn<ConsoleSink['info']>(),
    warn: vi.fn<ConsoleSink['warn']>(),
    error: vi.fn<ConsoleSink['error']>(),
});

describe('LogStore', () => {
    it('keeps the newest entry first and caps the history', () => {
        const store = new LogStore({ maxEntries: 3 });
        ['one', 'two', 'three', 'four'].forEach((message) => store.logInfo('test', message));

        expect(store.getEntries().map((entry) => entry.message)).toEqual(['four', 'three', 'two']);
    });

    it('notifies subscribers until they unsubscribe', () => {
        const store = new LogStore();
        const listener = vi.fn();
        const unsubscribe = store.subscribe(listener);

        store.logWarning('motion', 'first');
        unsubscribe();
        store.logWarning('motion', 'second');

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener.mock.calls[0][0]).toMatchObject({ scope: 'motion', severity: 'warning', message: 'first' });
    });

    it('mirrors entries to the console sink by severity', () => {
        const sink = createSink();
        const store = new LogStore({ console: sink });

        store.logInfo('capture', 'started');
        store.logWarning('serial', 'retrying', { attempt: 2 });
        store.logError('motion', 'halted');

        expect(sink.info).toHaveBeenCalledWith('[capture] started');
        expect(sink.warn).toHaveBeenCalledWith('[serial] retrying', { attempt: 2 });
        expect(sink.error).toHaveBeenCalledWith('[motion] halted');
    });

    it('clears the history', () => {
        const store = new LogStore();
        store.logError('motion', 'halted');
        store.clear();
        expect(store.getEntries()).toEqual([]);
    });
});
