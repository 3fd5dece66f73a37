// src/sockets/handlers/connection.handlers.ts

import { BattleService } from '../../services/battle.service';
import { BattleError } from '../../core/errors/battle.errors';
import { RoomBroadcaster } from '../broadcaster';
import { BattleServer, BattleSocket } from '../socket.types';

/**
 * ¿Sigue el usuario conectado a la sala con otro socket?
 */
function hasOtherSocketInRoom(io: BattleServer, code: string, socket: BattleSocket): boolean {
    const socketIds = io.sockets.adapter.rooms.get(code);
    if (!socketIds) return false;

    for (const socketId of socketIds) {
        if (socketId === socket.id) continue;
        const other = io.sockets.sockets.get(socketId);
        if (other?.data.user.id === socket.data.user.id) return true;
    }
    return false;
}

/**
 * Saca al usuario de la sala si sigue en espera
 */
function leaveOnDisconnect(code: string, userId: string, battle: BattleService, broadcaster: RoomBroadcaster): void {
    const state = battle.peek(code);
    if (!state || state.status !== 'waiting') return;
    if (!state.ranking.some(entry => entry.userId === userId)) return;

    const result = battle.leaveRoom(code, userId);
    if (result.state) {
        broadcaster.roomUpdated(result.state);
        console.log(`Sala ${code} actualizada. Jugadores restantes: ${result.state.ranking.length}`);
    } else {
        broadcaster.roomClosed(code, 'left');
        console.log(`Sala ${code} eliminada (quedó vacía)`);
    }
}

/**
 * Maneja eventos de conexión y desconexión de sockets
 * En la sala de espera el jugador sale al desconectarse; con la ronda en curso
 * se queda (sus taps cuentan) y la sala caduca sola por inactividad.
 */
export function registerConnectionHandlers(
    io: BattleServer,
    socket: BattleSocket,
    battle: BattleService,
    broadcaster: RoomBroadcaster
): void {

    socket.on('disconnecting', (reason) => {
        const user = socket.data.user;
        console.log(`Socket desconectado: ${socket.id} (${user.name}), razón: ${reason}`);

        for (const code of Array.from(socket.rooms)) {
            if (code === socket.id) continue;
            if (hasOtherSocketInRoom(io, code, socket)) continue;

            try {
                leaveOnDisconnect(code, user.id, battle, broadcaster);
            } catch (err) {
                if (err instanceof BattleError) {
                    console.warn(`⚠️ No se pudo sacar a ${user.name} de la sala ${code}: ${err.message}`);
                } else {
                    console.error('Error al desconectar el socket:', err);
                }
            }
        }
    });
}
