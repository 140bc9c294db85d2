import { describe, it, expect } from 'vitest';
import { SessionStore } from '../sessionStore.js';
import { RecordingChannel } from '../../__tests__/helpers/channels.js';
import type { ClientEvent } from '../../types.js';

const fixedNow = () => new Date(2024, 0, 2, 3, 4, 5);

function browser(store: SessionStore): RecordingChannel<ClientEvent> {
  return new RecordingChannel<ClientEvent>('downstream', store.nextId());
}

describe('SessionStore', () => {
  it('numbers session ids with a timestamp and a running counter', () => {
    const store = new SessionStore(fixedNow);
    expect(store.nextId()).toBe('session_20240102030405_1');
    expect(store.nextId()).toBe('session_20240102030405_2');
  });

  it('starts sessions pending and tracks them until removal', () => {
    const store = new SessionStore(fixedNow);
    const channel = browser(store);
    const session = store.create(channel, '10.0.0.5');

    expect(session.state).toBe('pending');
    expect(store.pending().map((entry) => entry.id)).toEqual([channel.id]);

    store.markOpen(channel.id, 'pool-1');
    expect(store.summary(channel.id)).toEqual({
      id: channel.id,
      state: 'open',
      remoteAddress: '10.0.0.5',
      createdAt: fixedNow().getTime(),
    });
    expect(store.openOn('pool-1').map((entry) => entry.id)).toEqual([channel.id]);
    expect(store.openOn('pool-2')).toEqual([]);

    expect(store.remove(channel.id)?.id).toBe(channel.id);
    expect(store.remove(channel.id)).toBeUndefined();
    expect(store.stats()).toEqual({ sessions: 0, pending: 0 });
  });

  it('rejects a second record under the same id', () => {
    const store = new SessionStore(fixedNow);
    const channel = browser(store);
    store.create(channel);
    expect(() => store.create(channel)).toThrow('SESSION_EXISTS');
  });
});
