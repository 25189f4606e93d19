import {describe, it, expect} from 'vitest';
import {Callable, HostObject, InvalidArgumentError, SignalRef} from '@/core';

class Counter extends HostObject {
    total = 0;

    add(n: unknown, step: unknown) {
        this.total += Number(n) * Number(step);
        return this.total;
    }
}

describe('Callable', () => {
    it('appends bound arguments after call arguments', () => {
        const counter = new Counter('Counter');
        const add = counter.callable('add').bind(10);

        expect(add.call(2)).toBe(20);
        expect(add.boundArgs).toEqual([10]);
    });

    it('dropBound() removes bound arguments from the end', () => {
        const fn = Callable.fromFunction((...args) => args);
        const bound = fn.bind('a', 'b', 'c');

        expect(bound.dropBound(2).call(1)).toEqual([1, 'a']);
        expect(bound.dropBound(5).boundArgs).toEqual([]);
        expect(bound.dropBound(-1).boundArgs).toEqual(['a', 'b', 'c']);
    });

    it('is valid only while its method exists on a live object', () => {
        const counter = new Counter('Counter');

        expect(counter.callable('add').isValid()).toBe(true);
        expect(counter.callable('total').isValid()).toBe(false);
        expect(counter.callable('nope').isValid()).toBe(false);

        counter.free();
        expect(counter.callable('add').isValid()).toBe(false);
    });

    it('custom functions are always valid; the null callable never is', () => {
        expect(Callable.fromFunction(() => 1).isValid()).toBe(true);
        expect(Callable.null().isValid()).toBe(false);
        expect(Callable.null().isNull()).toBe(true);
    });

    it('call() on an invalid callable throws invalid_callable', () => {
        const counter = new Counter('Counter');
        const add = counter.callable('add');
        counter.free();

        expect(() => add.call(1, 1)).toThrow(InvalidArgumentError);
        expect(() => add.call(1, 1)).toThrow('call: Counter (freed)::add is not invokable');
    });

    it('equals() compares bound args deeply', () => {
        const counter = new Counter('Counter');
        const a = counter.callable('add');

        expect(a.equals(counter.callable('add'))).toBe(true);
        expect(a.bind({k: [1]}).equals(a.bind({k: [1]}))).toBe(true);
        expect(a.bind({k: [1]}).equals(a.bind({k: [2]}))).toBe(false);
        expect(a.equals(new Counter('Other').callable('add'))).toBe(false);
        expect(a.equals(null)).toBe(false);
    });
});

describe('HostObject and SignalRef', () => {
    it('rejects an empty signal name', () => {
        const obj = new HostObject('Obj');
        expect(() => obj.addSignal('  ')).toThrow(InvalidArgumentError);
    });

    it('signals have a live owner only while declared and alive', () => {
        const obj = new HostObject('Obj', ['changed']);

        expect(obj.signal('changed').hasLiveOwner()).toBe(true);
        expect(obj.signal('other').hasLiveOwner()).toBe(false);

        obj.addSignal('other');
        expect(obj.signal('other').hasLiveOwner()).toBe(true);
        expect(obj.signalNames()).toEqual(['changed', 'other']);

        obj.free();
        expect(obj.signal('changed').hasLiveOwner()).toBe(false);
    });

    it('runs free listeners once', () => {
        const obj = new HostObject('Obj');
        const seen: string[] = [];
        obj.onFree((o) => seen.push(o.toString()));
        const off = obj.onFree(() => seen.push('removed'));
        off();

        obj.free();
        obj.free();

        expect(seen).toEqual(['Obj (freed)']);
        expect(obj.isAlive()).toBe(false);
    });

    it('null signal refs', () => {
        const ref = SignalRef.null();
        expect(ref.isNull()).toBe(true);
        expect(ref.hasLiveOwner()).toBe(false);
        expect(ref.toString()).toBe('<null signal>');
        expect(ref.equals(SignalRef.null())).toBe(true);
    });
});
