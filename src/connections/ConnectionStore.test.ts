import { describe, it, expect } from 'vitest';

import { IndexError } from '../errors.js';
import { ConnectionStore } from './ConnectionStore.js';
import type { ConnectionInput } from './types.js';

function makeInput(overrides: Partial<ConnectionInput> = {}): ConnectionInput {
  return {
    name: 'home',
    host: 'h.example.com',
    port: 22,
    username: 'alice',
    remotePath: '/home/alice',
    localMountPoint: '/mnt/home',
    identityFile: '',
    extraArgs: [],
    ...overrides,
  };
}

function sequentialIds(): () => string {
  let n = 0;
  return () => `conn-${++n}`;
}

describe('ConnectionStore', () => {
  describe('add', () => {
    it('appends in order and assigns ids', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ name: 'a' }));
      store.add(makeInput({ name: 'b' }));

      expect(store.list().map((c) => [c.id, c.name])).toEqual([
        ['conn-1', 'a'],
        ['conn-2', 'b'],
      ]);
      expect(store.size).toBe(2);
    });

    it('keeps a supplied id', () => {
      const store = new ConnectionStore(sequentialIds());
      const stored = store.add(makeInput({ id: 'conn-saved' }));
      expect(stored.id).toBe('conn-saved');
    });

    it('replaces a supplied id that is already taken', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ id: 'conn-saved' }));
      const second = store.add(makeInput({ id: 'conn-saved' }));
      expect(second.id).toBe('conn-1');
    });

    it('allows duplicate names', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ name: 'dup' }));
      store.add(makeInput({ name: 'dup' }));
      expect(store.findByName('dup').map((c) => c.id)).toEqual(['conn-1', 'conn-2']);
    });

    it('stores a copy the caller cannot mutate', () => {
      const store = new ConnectionStore(sequentialIds());
      const extraArgs = ['-o', 'reconnect'];
      const stored = store.add(makeInput({ extraArgs }));
      extraArgs.push('-C');

      expect(stored.extraArgs).toEqual(['-o', 'reconnect']);
      expect(Object.isFrozen(stored)).toBe(true);
    });
  });

  describe('update', () => {
    it('replaces fields and keeps the id (last write wins)', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ name: 'a' }));
      store.update(0, makeInput({ name: 'first', id: 'ignored' }));
      store.update(0, makeInput({ name: 'second' }));

      expect(store.at(0)).toMatchObject({ id: 'conn-1', name: 'second' });
    });

    it('rejects an out-of-range index', () => {
      const store = new ConnectionStore(sequentialIds());
      expect(() => store.update(0, makeInput())).toThrow(IndexError);
    });
  });

  describe('remove', () => {
    it('removes and shifts later entries only', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ name: 'a' }));
      store.add(makeInput({ name: 'b' }));
      store.add(makeInput({ name: 'c' }));

      const removed = store.remove(1);

      expect(removed.name).toBe('b');
      expect(store.list().map((c) => c.name)).toEqual(['a', 'c']);
      expect(store.indexOf('conn-1')).toBe(0);
      expect(store.indexOf('conn-3')).toBe(1);
    });

    it.each([-1, 3, 1.5])('throws IndexError for index %s', (index) => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput());
      store.add(makeInput());
      store.add(makeInput());

      expect(() => store.remove(index)).toThrow(
        `Connection index ${index} out of range (size 3)`,
      );
      expect(store.size).toBe(3);
    });

    it('reports index and size on the error', () => {
      const store = new ConnectionStore(sequentialIds());
      try {
        store.remove(0);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(IndexError);
        if (err instanceof IndexError) {
          expect(err.index).toBe(0);
          expect(err.size).toBe(0);
          expect(err.name).toBe('IndexError');
        }
      }
    });
  });

  describe('lookup', () => {
    it('finds by id and reports missing ids', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ name: 'a' }));

      expect(store.getById('conn-1')?.name).toBe('a');
      expect(store.getById('conn-9')).toBeUndefined();
      expect(store.indexOf('conn-9')).toBe(-1);
    });
  });

  describe('replaceAll', () => {
    it('swaps the whole list and keeps loaded ids', () => {
      const store = new ConnectionStore(sequentialIds());
      store.add(makeInput({ name: 'old' }));

      store.replaceAll([
        makeInput({ id: 'conn-a', name: 'x' }),
        makeInput({ name: 'y' }),
      ]);

      expect(store.list().map((c) => [c.id, c.name])).toEqual([
        ['conn-a', 'x'],
        ['conn-2', 'y'],
      ]);
    });
  });
});
