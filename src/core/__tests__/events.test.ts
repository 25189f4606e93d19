import {describe, it, expect, vi} from 'vitest';
import {EventBus} from '../events';

type Events = {
    ping: { n: number };
    pong: string;
};

describe('EventBus', () => {
    it('delivers payloads until the handler is removed', () => {
        const bus = new EventBus<Events>();
        const seen: number[] = [];
        const off = bus.on('ping', (p) => seen.push(p.n));

        bus.emit('ping', {n: 1});
        off();
        bus.emit('ping', {n: 2});

        expect(seen).toEqual([1]);
        expect(bus.listenerCount('ping')).toBe(0);
    });

    it('once() fires a single time', () => {
        const bus = new EventBus<Events>();
        const h = vi.fn();
        bus.once('pong', h);

        bus.emit('pong', 'a');
        bus.emit('pong', 'b');

        expect(h).toHaveBeenCalledTimes(1);
        expect(h).toHaveBeenCalledWith('a');
    });

    it('logs a throwing listener and still calls the rest', () => {
        const logger = {warn: vi.fn(), error: vi.fn()};
        const bus = new EventBus<Events>(logger);
        const after = vi.fn();
        bus.on('pong', () => {
            throw new Error('nope');
        });
        bus.on('pong', after);

        bus.emit('pong', 'x');

        expect(after).toHaveBeenCalledWith('x');
        expect(logger.error).toHaveBeenCalledWith(
            '[EventBus] listener for "pong" threw',
            expect.any(Error),
        );
    });

    it('clear() drops every listener', () => {
        const bus = new EventBus<Events>();
        const h = vi.fn();
        bus.on('ping', h);
        bus.clear();

        bus.emit('ping', {n: 1});

        expect(h).not.toHaveBeenCalled();
    });
});
