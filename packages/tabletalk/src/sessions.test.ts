import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { Session, SessionStore } from './sessions.js';
import { SessionNotFoundError } from './errors.js';

const logger = pino({ level: 'silent' });

describe('Session', () => {
  it('runs exclusive work in call order', async () => {
    const session = new Session('s1', 5);
    const order: string[] = [];

    const slow = session.exclusive(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('slow');
    });
    const fast = session.exclusive(() => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow', 'fast']);
  });

  it('keeps the queue running after a failure', async () => {
    const session = new Session('s1', 5);

    const failing = session.exclusive(() => {
      throw new Error('boom');
    });
    const next = session.exclusive(() => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('serializes racing next-page calls', async () => {
    const session = new Session('s1', 1);
    session.cursor.storeResult([{ id: 1 }, { id: 2 }]);

    const pages = await Promise.all([
      session.exclusive(() => session.cursor.nextPage()),
      session.exclusive(() => session.cursor.nextPage()),
      session.exclusive(() => session.cursor.nextPage()),
    ]);

    expect(pages).toEqual([
      { done: false, rows: [{ id: 1 }], page: 1 },
      { done: false, rows: [{ id: 2 }], page: 2 },
      { done: true, page: 2 },
    ]);
  });
});

describe('SessionStore', () => {
  it('opens sessions with their own cursor', () => {
    const store = new SessionStore({ pageSize: 3, logger });
    const a = store.open();
    const b = store.open();

    expect(a.id).not.toBe(b.id);
    expect(a.cursor).not.toBe(b.cursor);
    expect(a.cursor.pageSize).toBe(3);
    expect(store.size).toBe(2);
  });

  it('throws SessionNotFoundError for unknown ids', () => {
    const store = new SessionStore({ pageSize: 3, logger });
    expect(() => store.get('missing')).toThrow(SessionNotFoundError);
    expect(() => store.get('missing')).toThrow('Session not found: missing');
  });

  it('closes sessions', () => {
    const store = new SessionStore({ pageSize: 3, logger });
    const session = store.open();

    expect(store.close(session.id)).toBe(true);
    expect(store.close(session.id)).toBe(false);
    expect(store.has(session.id)).toBe(false);
  });

  it('evicts the least recently used session when full', () => {
    const store = new SessionStore({ pageSize: 3, maxSessions: 2, logger });
    const first = store.open();
    const second = store.open();

    store.get(first.id);
    const third = store.open();

    expect(store.size).toBe(2);
    expect(store.has(first.id)).toBe(true);
    expect(store.has(second.id)).toBe(false);
    expect(store.has(third.id)).toBe(true);
  });
});
