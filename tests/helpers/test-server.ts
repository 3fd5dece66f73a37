import { io as connect, Socket } from 'socket.io-client';

import { createBattleServer, BattleServerContext } from '../../src/bootstrap';
import { loadConfig } from '../../src/config/env.config';
import { FakeClock, sequenceCodes } from './fake-clock';

export type TestServer = {
  ctx: BattleServerContext;
  baseUrl: string;
};

export async function startTestServer(fake: FakeClock, codes: string[]): Promise<TestServer> {
  const ctx = createBattleServer(loadConfig({}), {
    silent: true,
    store: { clock: fake.clock, generateCode: sequenceCodes(...codes) },
  });
  const port = await ctx.listen(0);
  return { ctx, baseUrl: `http://127.0.0.1:${port}` };
}

export type TestUser = { id: string; name: string };

export type HttpResult = { status: number; body: unknown };

export async function callApi(
  baseUrl: string,
  method: 'GET' | 'POST',
  path: string,
  options: { user?: TestUser; body?: unknown; rawBody?: string } = {},
): Promise<HttpResult> {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (options.user) {
    headers['x-user-id'] = options.user.id;
    headers['x-user-name'] = options.user.name;
  }

  const body = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
  const res = await fetch(`${baseUrl}${path}`, { method, headers, body });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

export function connectClient(baseUrl: string, user?: TestUser): Socket {
  return connect(baseUrl, {
    auth: user ? { userId: user.id, name: user.name } : {},
    transports: ['websocket'],
    forceNew: true,
    reconnection: false,
  });
}

export function waitForConnect(socket: Socket): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.once('connect', () => resolve());
    socket.once('connect_error', reject);
  });
}

export function waitForEvent(socket: Socket, event: string): Promise<unknown> {
  return new Promise((resolve) => {
    socket.once(event, (payload: unknown) => resolve(payload));
  });
}

export function request(socket: Socket, event: string, payload: unknown = {}): Promise<unknown> {
  return new Promise((resolve) => {
    socket.emit(event, payload, (response: unknown) => resolve(response));
  });
}
