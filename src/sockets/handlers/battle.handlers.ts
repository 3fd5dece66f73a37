// src/sockets/handlers/battle.handlers.ts

import { BattleService } from '../../services/battle.service';
import { BattleError } from '../../core/errors/battle.errors';
import { BATTLE_EVENTS } from '../../core/constants';
import {
    JoinPayloadSchema,
    parsePayload,
    ReadyPayloadSchema,
    RoomCodePayloadSchema,
} from '../../core/schemas/battle.schemas';
import { RoomBroadcaster } from '../broadcaster';
import { Ack, AckResponse, BattleServer, BattleSocket } from '../socket.types';

/**
 * Ejecuta la acción y responde por callback con el resultado o el error
 */
function respond<T>(ack: Ack<T> | undefined, action: () => T): void {
    let response: AckResponse<T>;
    try {
        response = { ok: true as const, ...action() };
    } catch (err) {
        if (err instanceof BattleError) {
            response = { ok: false, error: err.toJSON() };
        } else {
            console.error('Error en handler de socket:', err);
            response = {
                ok: false,
                error: { code: 'INTERNAL', message: err instanceof Error ? err.message : 'Something went wrong' }
            };
        }
    }
    ack?.(response);
}

/**
 * Maneja eventos de la batalla de taps
 */
export function registerBattleHandlers(
    _io: BattleServer,
    socket: BattleSocket,
    battle: BattleService,
    broadcaster: RoomBroadcaster
): void {
    const user = socket.data.user;

    // Crear sala
    socket.on(BATTLE_EVENTS.CREATE, (_payload, ack) => {
        respond(ack, () => {
            const state = battle.createRoom(user);
            socket.join(state.code);

            console.log(`✨ Sala creada: ${state.code} | Dueño: ${user.name} (socket: ${socket.id})`);
            return { state };
        });
    });

    // Unirse a sala (también vuelve a suscribir un socket nuevo del mismo usuario)
    socket.on(BATTLE_EVENTS.JOIN, (payload, ack) => {
        respond(ack, () => {
            const { code, name } = parsePayload(JoinPayloadSchema, payload);
            const state = battle.joinRoom(code, user, name ?? user.name);
            socket.join(state.code);

            broadcaster.roomUpdated(state);
            return { state };
        });
    });

    // Marcar listo
    socket.on(BATTLE_EVENTS.READY, (payload, ack) => {
        respond(ack, () => {
            const { code, ready } = parsePayload(ReadyPayloadSchema, payload);
            const state = battle.setReady(code, user.id, ready);

            broadcaster.roomUpdated(state);
            return { state };
        });
    });

    // Salir de la sala
    socket.on(BATTLE_EVENTS.LEAVE, (payload, ack) => {
        respond(ack, () => {
            const { code } = parsePayload(RoomCodePayloadSchema, payload);
            const result = battle.leaveRoom(code, user.id);
            socket.leave(code);

            if (result.state) {
                broadcaster.roomUpdated(result.state);
            } else {
                broadcaster.roomClosed(code, 'left');
            }
            return result;
        });
    });

    // Iniciar ronda
    socket.on(BATTLE_EVENTS.START, (payload, ack) => {
        respond(ack, () => {
            const { code } = parsePayload(RoomCodePayloadSchema, payload);
            const state = battle.startRound(code, user.id);

            broadcaster.roomUpdated(state);
            return { state };
        });
    });

    // Tap
    socket.on(BATTLE_EVENTS.TAP, (payload, ack) => {
        respond(ack, () => {
            const { code } = parsePayload(RoomCodePayloadSchema, payload);
            const result = battle.tap(code, user.id);

            broadcaster.roomUpdated(result.state);
            return result;
        });
    });

    // Rendirse
    socket.on(BATTLE_EVENTS.SURRENDER, (payload, ack) => {
        respond(ack, () => {
            const { code } = parsePayload(RoomCodePayloadSchema, payload);
            const state = battle.surrender(code, user.id);

            broadcaster.roomUpdated(state);
            return { state };
        });
    });

    // Consultar estado (polling)
    socket.on(BATTLE_EVENTS.STATE, (payload, ack) => {
        respond(ack, () => {
            const { code } = parsePayload(RoomCodePayloadSchema, payload);
            return { state: battle.getState(code) };
        });
    });

    // Listar salas abiertas
    socket.on(BATTLE_EVENTS.LIST, (_payload, ack) => {
        respond(ack, () => ({ rooms: battle.listOpenRooms() }));
    });
}
