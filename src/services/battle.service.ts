// src/services/battle.service.ts

import {
    LeaveResult,
    OpenRoomSummary,
    Participant,
    Room,
    RoomSnapshot,
    SessionUser,
} from '../core/domain';
import { MIN_PLAYERS_TO_START } from '../core/constants';
import { ForbiddenError, InvalidStateError, RoomNotFoundError } from '../core/errors/battle.errors';
import {
    activeParticipants,
    assertStatus,
    buildRanking,
    describeFinish,
    finishRound,
    getSecondsRemaining,
} from '../core/rules/battle.rules';
import { toIso } from '../utils/time/clock.util';
import { RoomStore } from './room.store';

export type BattleServiceOptions = {
    minPlayersToStart?: number;
    silent?: boolean;
};

export type TapResult = {
    count: number;
    state: RoomSnapshot;
};

/**
 * Servicio de la batalla de taps
 * Responsable del ciclo de vida de la sala: unirse, iniciar, taps, rendición y ranking
 *
 * Todas las operaciones son síncronas: cada una termina antes de que el event
 * loop atienda otra petición, así que una sala nunca se modifica a medias.
 */
export class BattleService {
    private readonly minPlayersToStart: number;
    private readonly silent: boolean;

    constructor(private readonly store: RoomStore, options: BattleServiceOptions = {}) {
        this.minPlayersToStart = options.minPlayersToStart ?? MIN_PLAYERS_TO_START;
        this.silent = options.silent ?? false;
    }

    /**
     * Crea una sala nueva con el usuario como dueño
     */
    createRoom(owner: SessionUser): RoomSnapshot {
        const room = this.store.create(owner);
        return this.toSnapshot(room, this.store.clock());
    }

    /**
     * Une a un usuario a una sala en espera
     * Volver a unirse con la misma identidad es idempotente (se refresca el nombre)
     */
    joinRoom(code: string, user: SessionUser, displayName: string = user.name): RoomSnapshot {
        const { room, now } = this.open(code);
        assertStatus(room, 'waiting', 'unirte');

        const existing = room.participants.get(user.id);
        if (existing) {
            existing.displayName = displayName;
        } else {
            room.participants.set(user.id, {
                userId: user.id,
                displayName,
                tapCount: 0,
                joinOrder: room.nextJoinOrder++,
                joinedAt: now,
                ready: false,
                surrendered: false,
            });
            this.log(`👤 ${displayName} (${user.id}) se unió a la sala ${room.code}`);
        }

        if (user.id === room.ownerId) room.ownerName = displayName;
        room.lastActiveAt = now;

        return this.toSnapshot(room, now);
    }

    /**
     * Marca o desmarca a un participante como listo
     */
    setReady(code: string, userId: string, ready: boolean): RoomSnapshot {
        const { room, now } = this.open(code);
        assertStatus(room, 'waiting', 'cambiar el estado de listo');

        this.requireParticipant(room, userId).ready = ready;
        room.lastActiveAt = now;

        return this.toSnapshot(room, now);
    }

    /**
     * Saca a un participante de una sala en espera
     * Si sale el dueño se transfiere al más antiguo; si queda vacía se elimina
     */
    leaveRoom(code: string, userId: string): LeaveResult {
        const { room, now } = this.open(code);
        assertStatus(room, 'waiting', 'salir');

        const leaving = this.requireParticipant(room, userId);
        room.participants.delete(userId);
        this.log(`🚪 ${leaving.displayName} (${userId}) salió de la sala ${room.code}`);

        if (room.participants.size === 0) {
            this.store.delete(room.code);
            return { roomDeleted: true, ownerChanged: false, state: null };
        }

        let ownerChanged = false;
        if (room.ownerId === userId) {
            const [newOwner] = room.participants.values();
            room.ownerId = newOwner.userId;
            room.ownerName = newOwner.displayName;
            ownerChanged = true;
            this.log(`👑 Sala ${room.code}: dueño transferido a ${newOwner.displayName} (${newOwner.userId})`);
        }

        room.lastActiveAt = now;
        return { roomDeleted: false, ownerChanged, state: this.toSnapshot(room, now) };
    }

    /**
     * Inicia la ronda (solo el dueño, solo en espera)
     */
    startRound(code: string, callerId: string): RoomSnapshot {
        const { room, now } = this.open(code);

        if (room.ownerId !== callerId) {
            throw new ForbiddenError('Solo el dueño puede iniciar la ronda');
        }
        assertStatus(room, 'waiting', 'iniciar la ronda');

        if (room.participants.size < this.minPlayersToStart) {
            throw new InvalidStateError(`Se necesitan al menos ${this.minPlayersToStart} jugadores para empezar`);
        }

        room.status = 'running';
        room.startedAt = now;
        room.lastActiveAt = now;
        this.log(`🏁 Ronda iniciada en la sala ${room.code} (${room.participants.size} jugadores)`);

        return this.toSnapshot(room, now);
    }

    /**
     * Suma un tap al participante durante la ronda
     */
    tap(code: string, userId: string): TapResult {
        const { room, now } = this.open(code);
        assertStatus(room, 'running', 'registrar taps');

        const participant = this.requireParticipant(room, userId);
        if (participant.surrendered) {
            throw new InvalidStateError('Ya te has rendido en esta ronda');
        }

        participant.tapCount += 1;
        room.lastActiveAt = now;

        return { count: participant.tapCount, state: this.toSnapshot(room, now) };
    }

    /**
     * Rendición de un participante
     * La ronda termina cuando queda como mucho un jugador activo
     */
    surrender(code: string, userId: string): RoomSnapshot {
        const { room, now } = this.open(code);
        assertStatus(room, 'running', 'rendirte');

        const participant = this.requireParticipant(room, userId);
        participant.surrendered = true;
        room.lastActiveAt = now;
        this.log(`🏳️ ${participant.displayName} (${userId}) se rindió en la sala ${room.code}`);

        if (activeParticipants(room).length <= 1) {
            finishRound(room, 'surrender', now);
            this.log(describeFinish(room));
        }

        return this.toSnapshot(room, now);
    }

    /**
     * Estado público de la sala (no cuenta como actividad)
     */
    getState(code: string): RoomSnapshot {
        const { room, now } = this.open(code);
        return this.toSnapshot(room, now);
    }

    /**
     * Como getState, pero devuelve null si la sala no existe
     */
    peek(code: string): RoomSnapshot | null {
        try {
            return this.getState(code);
        } catch (err) {
            if (err instanceof RoomNotFoundError) return null;
            throw err;
        }
    }

    /**
     * Salas en espera, de la más reciente a la más antigua
     */
    listOpenRooms(): OpenRoomSummary[] {
        return this.store.list()
            .filter(room => room.status === 'waiting')
            .reverse()
            .sort((a, b) => b.createdAt - a.createdAt)
            .map(room => ({
                code: room.code,
                ownerName: room.ownerName,
                playerCount: room.participants.size,
                createdAt: new Date(room.createdAt).toISOString(),
            }));
    }

    toSnapshot(room: Room, now: number): RoomSnapshot {
        return {
            code: room.code,
            ownerId: room.ownerId,
            ownerName: room.ownerName,
            status: room.status,
            durationSeconds: room.durationSeconds,
            secondsRemaining: getSecondsRemaining(room, now),
            startedAt: toIso(room.startedAt),
            finishedAt: toIso(room.finishedAt),
            ranking: buildRanking(room),
            outcome: room.outcome ? { ...room.outcome } : null,
        };
    }

    /**
     * Busca la sala; store.get ya aplicó la transición perezosa
     */
    private open(code: string): { room: Room; now: number } {
        const now = this.store.clock();
        return { room: this.store.get(code), now };
    }

    private requireParticipant(room: Room, userId: string): Participant {
        const participant = room.participants.get(userId);
        if (!participant) {
            throw new ForbiddenError('No estás en esta sala');
        }
        return participant;
    }

    private log(message: string): void {
        if (!this.silent) console.log(message);
    }
}
