// src/sockets/socket.types.ts

import { Server, Socket } from 'socket.io';
import { LeaveResult, OpenRoomSummary, RoomSnapshot, SessionUser } from '../core/domain';
import { BattleErrorBody } from '../core/errors/battle.errors';

/**
 * Respuesta por callback de cada evento del cliente
 */
export type AckResponse<T> =
    | ({ ok: true } & T)
    | { ok: false; error: BattleErrorBody | { code: 'INTERNAL'; message: string } };

export type Ack<T> = (response: AckResponse<T>) => void;

export type StateAck = Ack<{ state: RoomSnapshot }>;

/**
 * Eventos que envía el cliente. Los payloads llegan sin tipar desde la red
 * y se validan con zod en el handler.
 */
export interface ClientToServerEvents {
    'battle:create': (payload: unknown, ack?: StateAck) => void;
    'battle:join': (payload: unknown, ack?: StateAck) => void;
    'battle:ready': (payload: unknown, ack?: StateAck) => void;
    'battle:leave': (payload: unknown, ack?: Ack<LeaveResult>) => void;
    'battle:start': (payload: unknown, ack?: StateAck) => void;
    'battle:tap': (payload: unknown, ack?: Ack<{ count: number; state: RoomSnapshot }>) => void;
    'battle:surrender': (payload: unknown, ack?: StateAck) => void;
    'battle:state': (payload: unknown, ack?: StateAck) => void;
    'battle:list': (payload: unknown, ack?: Ack<{ rooms: OpenRoomSummary[] }>) => void;
}

/**
 * Eventos que emite el servidor
 */
export interface ServerToClientEvents {
    'battle:update': (state: RoomSnapshot) => void;
    'battle:closed': (payload: { code: string; reason: 'left' | 'expired' }) => void;
}

export interface InterServerEvents {}

/**
 * Datos que el servidor guarda por socket tras autenticar el handshake
 */
export interface SocketData {
    user: SessionUser;
}

export type BattleServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
export type BattleSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
