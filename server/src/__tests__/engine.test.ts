import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { BindingsSnapshot } from '@reaction-roles/shared';
import { ReactRolesEngine } from '../react-roles/engine.js';
import {
  AlreadyBoundError,
  InvalidSymbolError,
  MessageNotFoundError,
  NotBoundError,
  PairInvalidError,
  RoleNotFoundError,
} from '../react-roles/errors.js';
import {
  CHANNEL,
  FakeMembershipStore,
  FakeTransport,
  GUILD,
  MemoryPersistence,
  member,
  msg,
} from './helpers/fakes.js';

const A = msg('300');
const B = msg('301');

let store: FakeMembershipStore;
let transport: FakeTransport;
let persistence: MemoryPersistence;
let engine: ReactRolesEngine;

function createEngine(snapshot?: BindingsSnapshot): ReactRolesEngine {
  persistence = new MemoryPersistence(snapshot);
  return new ReactRolesEngine(
    { store, transport, persistence },
    { maxProcessedPerSecond: 0, maxForbiddenAttempts: 3 },
  );
}

beforeEach(() => {
  store = new FakeMembershipStore();
  transport = new FakeTransport();
  transport.addMessage(A);
  transport.addMessage(B);
  engine = createEngine();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  await engine.stop();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Restore
// ---------------------------------------------------------------------------

describe('restore', () => {
  const persisted: BindingsSnapshot = {
    bindings: { [GUILD]: { [CHANNEL]: { '300': { '🔴': 'r1' }, '302': { '🟢': 'r3' } } } },
    links: {
      [GUILD]: {
        colors: [
          { channelId: CHANNEL, messageId: '300' },
          { channelId: CHANNEL, messageId: '302' },
        ],
      },
    },
  };

  it('drops messages that no longer exist and saves the cleaned snapshot', async () => {
    engine = createEngine(persisted);

    await engine.restore();

    const expected: BindingsSnapshot = {
      bindings: { [GUILD]: { [CHANNEL]: { '300': { '🔴': 'r1' } } } },
      links: { [GUILD]: { colors: [{ channelId: CHANNEL, messageId: '300' }] } },
    };
    expect(engine.snapshot()).toEqual(expected);
    expect(persistence.saves).toEqual([expected]);
  });

  it('keeps bindings of messages it could not check', async () => {
    transport.unreachable.add(`${GUILD}/${CHANNEL}/302`);
    engine = createEngine(persisted);

    await engine.restore();

    expect(engine.snapshot()).toEqual(persisted);
    expect(persistence.saves).toHaveLength(0);
  });

  it('drops bindings whose role was deleted', async () => {
    transport.missingRoles.add('r9');
    engine = createEngine({
      bindings: {
        [GUILD]: { [CHANNEL]: { '300': { '🔴': 'r1', '🔵': 'r9' }, '301': { '🟢': 'r9' } } },
      },
      links: {},
    });

    await engine.restore();

    const expected: BindingsSnapshot = {
      bindings: { [GUILD]: { [CHANNEL]: { '300': { '🔴': 'r1' } } } },
      links: {},
    };
    expect(engine.snapshot()).toEqual(expected);
    expect(persistence.saves).toEqual([expected]);
  });

  it('narrows link exclusion sets after dropping a deleted role', async () => {
    transport.missingRoles.add('r2');
    engine = createEngine({
      bindings: { [GUILD]: { [CHANNEL]: { '300': { '🔴': 'r1', '🔵': 'r2' }, '301': { '🟢': 'r3' } } } },
      links: {
        [GUILD]: {
          colors: [
            { channelId: CHANNEL, messageId: '300' },
            { channelId: CHANNEL, messageId: '301' },
          ],
        },
      },
    });

    await engine.restore();

    expect(engine.links.exclusivity(B)).toEqual(new Set(['r1', 'r3']));
  });

  it('starts empty without a snapshot', async () => {
    await engine.start();

    expect(engine.snapshot()).toEqual({ bindings: {}, links: {} });
    expect(engine.status().running).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Admin operations
// ---------------------------------------------------------------------------

describe('bind', () => {
  it('stores custom emotes by id, reacts with the marker and persists', async () => {
    const symbol = await engine.bind(A, '<:party:123456789>', 'r1');

    expect(symbol).toBe('123456789');
    expect(engine.bindings.lookup(A, '123456789')).toBe('r1');
    expect(transport.markers).toEqual([{ ref: A, symbol: '123456789' }]);
    expect(persistence.saves.at(-1)?.bindings).toEqual({
      [GUILD]: { [CHANNEL]: { '300': { '123456789': 'r1' } } },
    });
  });

  it('rejects a symbol that is already bound', async () => {
    await engine.bind(A, '🔴', 'r1');

    await expect(engine.bind(A, '🔴', 'r2')).rejects.toThrow(AlreadyBoundError);
    expect(engine.bindings.lookup(A, '🔴')).toBe('r1');
  });

  it('rejects a role that does not exist', async () => {
    transport.missingRoles.add('r9');

    await expect(engine.bind(A, '🔴', 'r9')).rejects.toThrow(RoleNotFoundError);
    expect(transport.markers).toHaveLength(0);
    expect(engine.bindings.has(A)).toBe(false);
    expect(persistence.saves).toHaveLength(0);
  });

  it('rejects a message that does not exist', async () => {
    await expect(engine.bind(msg('999'), '🔴', 'r1')).rejects.toThrow(MessageNotFoundError);
    expect(persistence.saves).toHaveLength(0);
  });

  it('rejects a symbol the platform cannot react with', async () => {
    transport.invalidSymbols.add('nope');

    await expect(engine.bind(A, 'nope', 'r1')).rejects.toThrow(InvalidSymbolError);
    expect(engine.bindings.has(A)).toBe(false);
  });

  it('widens the exclusion set of a linked message', async () => {
    await engine.bind(A, '🔴', 'r1');
    await engine.bind(B, '🟢', 'r3');
    await engine.link(GUILD, 'colors', [
      { channelId: CHANNEL, messageId: '300' },
      { channelId: CHANNEL, messageId: '301' },
    ]);

    await engine.bind(A, '🔵', 'r2');

    expect(engine.links.exclusivity(B)).toEqual(new Set(['r1', 'r2', 'r3']));
  });
});

describe('unbind', () => {
  beforeEach(async () => {
    await engine.bind(A, '🔴', 'r1');
    await engine.bind(A, '🔵', 'r2');
  });

  it('unbinds by symbol', async () => {
    const removed = await engine.unbind(A, { symbol: '🔴' });

    expect(removed).toEqual({ symbol: '🔴', roleId: 'r1' });
    expect(engine.bindings.lookup(A, '🔴')).toBeUndefined();
    expect(transport.cleared).toHaveLength(0);
  });

  it('unbinds by role and clears the reactions when asked', async () => {
    const removed = await engine.unbind(A, { roleId: 'r2', clearReactions: true });

    expect(removed).toEqual({ symbol: '🔵', roleId: 'r2' });
    expect(transport.cleared).toEqual([{ ref: A, symbol: '🔵' }]);
  });

  it('rejects a role that is not bound', async () => {
    await expect(engine.unbind(A, { roleId: 'r9' })).rejects.toThrow(NotBoundError);
  });
});

describe('link', () => {
  it('rejects messages without bindings', async () => {
    await engine.bind(A, '🔴', 'r1');

    await expect(
      engine.link(GUILD, 'colors', [
        { channelId: CHANNEL, messageId: '300' },
        { channelId: CHANNEL, messageId: '301' },
      ]),
    ).rejects.toThrow(PairInvalidError);
  });

  it('lists and removes link groups', async () => {
    await engine.bind(A, '🔴', 'r1');
    await engine.bind(B, '🟢', 'r3');
    const messages = [
      { channelId: CHANNEL, messageId: '300' },
      { channelId: CHANNEL, messageId: '301' },
    ];
    await engine.link(GUILD, 'colors', messages);

    expect(engine.listLinks(GUILD)).toEqual([{ name: 'colors', messages }]);

    await engine.unlink(GUILD, 'colors');

    expect(engine.listLinks(GUILD)).toEqual([]);
    expect(persistence.saves.at(-1)?.links).toEqual({});
  });
});

// ---------------------------------------------------------------------------
// Reactions to role writes
// ---------------------------------------------------------------------------

describe('reaction flow', () => {
  beforeEach(async () => {
    await engine.bind(A, '🔴', 'r1');
    await engine.bind(A, '🔵', 'r2');
    await engine.bind(B, '🟢', 'r3');
    await engine.link(GUILD, 'colors', [
      { channelId: CHANNEL, messageId: '300' },
      { channelId: CHANNEL, messageId: '301' },
    ]);
  });

  it('swaps roles within a linked group', async () => {
    store.setRoles(member('u1'), ['r0', 'r1']);

    await engine.handlers.onReactionAdded(B, '🟢', 'u1');
    await engine.worker.processNext();

    expect(store.replaceCalls).toHaveLength(1);
    expect(store.replaceCalls[0].roles.has('r3')).toBe(true);
    expect(store.replaceCalls[0].roles.has('r1')).toBe(false);
    expect(store.rolesOf(member('u1'))).toEqual(new Set(['r0', 'r3']));
  });

  it('writes once for a burst of toggles', async () => {
    await engine.handlers.onReactionAdded(A, '🔴', 'u1');
    await engine.handlers.onReactionRemoved(A, '🔴', 'u1');
    await engine.handlers.onReactionAdded(A, '🔵', 'u1');

    expect(engine.status().pending).toBe(1);
    await engine.worker.processNext();

    expect(store.replaceCalls).toHaveLength(1);
    expect(store.rolesOf(member('u1'))).toEqual(new Set(['r2']));
    expect(engine.status()).toEqual({
      running: false,
      pending: 0,
      counters: { processed: 1, writes: 1, noops: 0, retries: 0, dropped: 0 },
    });
  });

  it('applies queued changes once started', async () => {
    await engine.handlers.onReactionAdded(A, '🔴', 'u1');

    await engine.start();
    await vi.waitFor(() => expect(store.rolesOf(member('u1'))).toEqual(new Set(['r1'])));
  });

  it('drops bindings of deleted messages', async () => {
    await engine.handlers.onMessageDeleted(A);

    expect(engine.snapshot()).toEqual({
      bindings: { [GUILD]: { [CHANNEL]: { '301': { '🟢': 'r3' } } } },
      links: { [GUILD]: { colors: [{ channelId: CHANNEL, messageId: '301' }] } },
    });
    expect(persistence.saves.at(-1)).toEqual(engine.snapshot());
  });
});
