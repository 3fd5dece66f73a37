// src/sockets/broadcaster.ts

import { RoomSnapshot } from '../core/domain';
import { BROADCAST_EVENTS } from '../core/constants';
import { BattleServer } from './socket.types';

/**
 * Difunde los cambios de sala a los sockets suscritos a su código.
 * HTTP y Socket.IO comparten la misma instancia, así que una acción por HTTP
 * también llega a los clientes en tiempo real.
 */
export class RoomBroadcaster {
    private io: BattleServer | null = null;

    attach(io: BattleServer): void {
        this.io = io;
    }

    detach(): void {
        this.io = null;
    }

    roomUpdated(state: RoomSnapshot): void {
        this.io?.to(state.code).emit(BROADCAST_EVENTS.UPDATE, state);
    }

    /**
     * Avisa del cierre y saca a todos los sockets de la sala, por si el código se reutiliza
     */
    roomClosed(code: string, reason: 'left' | 'expired'): void {
        if (!this.io) return;

        this.io.to(code).emit(BROADCAST_EVENTS.CLOSED, { code, reason });
        this.io.in(code).socketsLeave(code);
    }
}
