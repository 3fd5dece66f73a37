import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Socket } from 'socket.io-client';

import { createFakeClock, FakeClock, T0 } from '../helpers/fake-clock';
import {
  callApi,
  connectClient,
  request,
  startTestServer,
  TestServer,
  TestUser,
  waitForConnect,
  waitForEvent,
} from '../helpers/test-server';

const ALICE = { id: 'U1', name: 'Ana' };
const BOB = { id: 'U2', name: 'Bea' };

describe('battle sockets', () => {
  let fake: FakeClock;
  let server: TestServer;
  let clients: Socket[];

  beforeEach(async () => {
    fake = createFakeClock();
    server = await startTestServer(fake, ['SOCK22', 'SOCK33']);
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) client.disconnect();
    await server.ctx.close();
  });

  async function connected(user: TestUser): Promise<Socket> {
    const socket = connectClient(server.baseUrl, user);
    clients.push(socket);
    await waitForConnect(socket);
    return socket;
  }

  async function lobby(): Promise<{ alice: Socket; bob: Socket }> {
    const alice = await connected(ALICE);
    const bob = await connected(BOB);
    await request(alice, 'battle:create');

    const joined = waitForEvent(alice, 'battle:update');
    await request(bob, 'battle:join', { code: 'SOCK22' });
    await joined;

    return { alice, bob };
  }

  it('rejects a handshake without identity', async () => {
    const socket = connectClient(server.baseUrl);
    clients.push(socket);

    await expect(waitForConnect(socket)).rejects.toThrow('Debes iniciar sesión');
  });

  it('acknowledges room creation with the state', async () => {
    const alice = await connected(ALICE);

    const response = await request(alice, 'battle:create');

    expect(response).toMatchObject({
      ok: true,
      state: { code: 'SOCK22', ownerId: 'U1', status: 'waiting', ranking: [{ rank: 1, userId: 'U1', tapCount: 0 }] },
    });
  });

  it('broadcasts joins to the room', async () => {
    const alice = await connected(ALICE);
    const bob = await connected(BOB);
    await request(alice, 'battle:create');

    const update = waitForEvent(alice, 'battle:update');
    const response = await request(bob, 'battle:join', { code: 'sock22' });

    expect(response).toMatchObject({ ok: true, state: { code: 'SOCK22' } });
    expect(await update).toMatchObject({
      code: 'SOCK22',
      ranking: [{ userId: 'U1' }, { userId: 'U2', displayName: 'Bea' }],
    });
  });

  it('answers validation errors through the ack', async () => {
    const bob = await connected(BOB);

    const response = await request(bob, 'battle:join', { code: 'X' });

    expect(response).toEqual({
      ok: false,
      error: { code: 'VALIDATION', message: 'code: El código debe tener 6 caracteres' },
    });
  });

  it('answers domain errors through the ack', async () => {
    const { bob } = await lobby();

    const response = await request(bob, 'battle:start', { code: 'SOCK22' });

    expect(response).toEqual({
      ok: false,
      error: { code: 'FORBIDDEN', message: 'Solo el dueño puede iniciar la ronda' },
    });
  });

  it('plays a round over the socket', async () => {
    const { alice, bob } = await lobby();

    const started = await request(alice, 'battle:start', { code: 'SOCK22' });
    expect(started).toMatchObject({ ok: true, state: { status: 'running', secondsRemaining: 60 } });

    await request(bob, 'battle:tap', { code: 'SOCK22' });
    const tap = await request(bob, 'battle:tap', { code: 'SOCK22' });
    expect(tap).toMatchObject({ ok: true, count: 2 });

    fake.set(T0 + 60_000);
    const state = await request(alice, 'battle:state', { code: 'SOCK22' });
    expect(state).toMatchObject({
      ok: true,
      state: {
        status: 'finished',
        finishedAt: '2024-01-01T00:01:00.000Z',
        outcome: { reason: 'timeout', winnerId: 'U2' },
        ranking: [
          { rank: 1, userId: 'U2', tapCount: 2 },
          { rank: 2, userId: 'U1', tapCount: 0 },
        ],
      },
    });
  });

  it('pushes HTTP actions to socket clients', async () => {
    const alice = await connected(ALICE);
    await request(alice, 'battle:create');

    const update = waitForEvent(alice, 'battle:update');
    await callApi(server.baseUrl, 'POST', '/api/battle/join', { user: BOB, body: { code: 'SOCK22' } });

    expect(await update).toMatchObject({ code: 'SOCK22', ranking: [{ userId: 'U1' }, { userId: 'U2' }] });
  });

  it('removes a player from the lobby when their socket drops', async () => {
    const { alice, bob } = await lobby();

    const update = waitForEvent(alice, 'battle:update');
    bob.disconnect();

    expect(await update).toMatchObject({ code: 'SOCK22', ranking: [{ userId: 'U1' }] });
    expect(server.ctx.battle.getState('SOCK22').ranking).toHaveLength(1);
  });

  it('keeps the player in a running round when their socket drops', async () => {
    const { alice, bob } = await lobby();
    await request(alice, 'battle:start', { code: 'SOCK22' });
    await request(bob, 'battle:tap', { code: 'SOCK22' });

    bob.disconnect();
    // el servidor quita el socket después de ejecutar 'disconnecting'
    await vi.waitFor(() => expect(server.ctx.io.sockets.sockets.size).toBe(1));

    expect(server.ctx.battle.getState('SOCK22').ranking).toHaveLength(2);
  });

  it('notifies the room when it expires and drops its sockets', async () => {
    const alice = await connected(ALICE);
    await request(alice, 'battle:create');

    const closed = waitForEvent(alice, 'battle:closed');
    fake.set(T0 + 5 * 60 * 1000 + 1);
    server.ctx.store.sweep();

    expect(await closed).toEqual({ code: 'SOCK22', reason: 'expired' });
    expect(server.ctx.io.sockets.adapter.rooms.has('SOCK22')).toBe(false);
  });

  it('drops the sockets of a room dissolved over HTTP', async () => {
    const alice = await connected(ALICE);
    await request(alice, 'battle:create');

    const closed = waitForEvent(alice, 'battle:closed');
    await callApi(server.baseUrl, 'POST', '/api/battle/leave', { user: ALICE, body: { code: 'SOCK22' } });

    expect(await closed).toEqual({ code: 'SOCK22', reason: 'left' });
    expect(server.ctx.io.sockets.adapter.rooms.has('SOCK22')).toBe(false);
  });

  it('survives a lobby socket dropping after the room went idle', async () => {
    const alice = await connected(ALICE);
    await request(alice, 'battle:create');

    fake.set(T0 + 5 * 60 * 1000 + 1);
    alice.disconnect();
    await vi.waitFor(() => expect(server.ctx.io.sockets.sockets.size).toBe(0));

    expect(server.ctx.store.size).toBe(0);
    const bob = await connected(BOB);
    expect(await request(bob, 'battle:list')).toEqual({ ok: true, rooms: [] });
  });

  it('lists open rooms', async () => {
    const alice = await connected(ALICE);
    await request(alice, 'battle:create');

    const response = await request(alice, 'battle:list');

    expect(response).toEqual({
      ok: true,
      rooms: [{ code: 'SOCK22', ownerName: 'Ana', playerCount: 1, createdAt: '2024-01-01T00:00:00.000Z' }],
    });
  });
});
