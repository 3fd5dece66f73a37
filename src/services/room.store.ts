// src/services/room.store.ts

import { Room, SessionUser } from '../core/domain';
import {
    MAX_CODE_ATTEMPTS,
    ROOM_TTL_MS,
    ROUND_DURATION_SECONDS,
    SWEEP_INTERVAL_MS,
} from '../core/constants';
import { ConflictError, RoomNotFoundError } from '../core/errors/battle.errors';
import { describeFinish, settleRoom } from '../core/rules/battle.rules';
import { generateRoomCode, normalizeRoomCode } from '../utils/generators/id.generator';
import { Clock, systemClock } from '../utils/time/clock.util';

export type RoomStoreOptions = {
    ttlMs?: number;
    sweepIntervalMs?: number;
    clock?: Clock;
    generateCode?: () => string;
    maxCodeAttempts?: number;
    silent?: boolean;
};

export type ExpiredRoomsListener = (codes: string[]) => void;

/**
 * Almacén en memoria de salas de batalla
 *
 * Se construye al arrancar el proceso y se libera con dispose() al apagarlo.
 * Cada instancia es independiente, no hay estado de módulo.
 */
export class RoomStore {
    private rooms: Map<string, Room> = new Map();
    private sweepTimer: NodeJS.Timeout | null = null;
    private expiredListeners: Set<ExpiredRoomsListener> = new Set();

    readonly ttlMs: number;
    readonly sweepIntervalMs: number;
    readonly clock: Clock;
    private readonly generateCode: () => string;
    private readonly maxCodeAttempts: number;
    private readonly silent: boolean;

    constructor(options: RoomStoreOptions = {}) {
        this.ttlMs = options.ttlMs ?? ROOM_TTL_MS;
        this.sweepIntervalMs = options.sweepIntervalMs ?? SWEEP_INTERVAL_MS;
        this.clock = options.clock ?? systemClock;
        this.generateCode = options.generateCode ?? (() => generateRoomCode());
        this.maxCodeAttempts = options.maxCodeAttempts ?? MAX_CODE_ATTEMPTS;
        this.silent = options.silent ?? false;
    }

    /**
     * Crea una sala en espera con el dueño como único participante
     */
    create(owner: SessionUser): Room {
        const now = this.clock();
        this.sweep(now);

        const code = this.reserveCode();
        const room: Room = {
            code,
            ownerId: owner.id,
            ownerName: owner.name,
            participants: new Map([[owner.id, {
                userId: owner.id,
                displayName: owner.name,
                tapCount: 0,
                joinOrder: 0,
                joinedAt: now,
                ready: false,
                surrendered: false,
            }]]),
            status: 'waiting',
            durationSeconds: ROUND_DURATION_SECONDS,
            startedAt: null,
            finishedAt: null,
            outcome: null,
            createdAt: now,
            lastActiveAt: now,
            nextJoinOrder: 1,
        };

        this.rooms.set(code, room);
        this.log(`🏠 Sala ${code} creada por ${owner.name} (${owner.id})`);
        return room;
    }

    /**
     * Obtiene una sala viva por su código
     */
    get(code: string): Room {
        this.sweep(this.clock());

        const room = this.rooms.get(normalizeRoomCode(code));
        if (!room) throw new RoomNotFoundError();

        return room;
    }

    has(code: string): boolean {
        this.sweep(this.clock());
        return this.rooms.has(normalizeRoomCode(code));
    }

    /**
     * Elimina una sala (idempotente)
     */
    delete(code: string): boolean {
        const normalized = normalizeRoomCode(code);
        const deleted = this.rooms.delete(normalized);
        if (deleted) this.log(`🗑️ Sala ${normalized} eliminada`);
        return deleted;
    }

    /**
     * Salas vivas, en orden de creación
     */
    list(): Room[] {
        this.sweep(this.clock());
        return Array.from(this.rooms.values());
    }

    get size(): number {
        return this.rooms.size;
    }

    /**
     * Cierra las rondas que agotaron su tiempo y elimina las salas inactivas
     * más tiempo que el TTL, sea cual sea su estado
     * @returns códigos eliminados
     */
    sweep(now: number = this.clock()): string[] {
        const expired: string[] = [];

        for (const [code, room] of this.rooms) {
            if (settleRoom(room, now)) this.log(describeFinish(room));
            if (now - room.lastActiveAt > this.ttlMs) {
                expired.push(code);
            }
        }

        if (expired.length === 0) return expired;

        for (const code of expired) {
            this.rooms.delete(code);
        }
        this.log(`🧹 Salas expiradas: ${expired.join(', ')}`);

        for (const listener of this.expiredListeners) {
            listener(expired);
        }

        return expired;
    }

    /**
     * Registra un listener para las salas eliminadas por expiración
     * @returns función para darlo de baja
     */
    onExpired(listener: ExpiredRoomsListener): () => void {
        this.expiredListeners.add(listener);
        return () => {
            this.expiredListeners.delete(listener);
        };
    }

    /**
     * Arranca el barrido periódico (no mantiene vivo el proceso)
     */
    startSweeper(): void {
        if (this.sweepTimer) return;

        this.sweepTimer = setInterval(() => {
            this.sweep();
        }, this.sweepIntervalMs);
        this.sweepTimer.unref();
    }

    stopSweeper(): void {
        if (!this.sweepTimer) return;

        clearInterval(this.sweepTimer);
        this.sweepTimer = null;
    }

    /**
     * Libera el almacén al apagar el servidor
     */
    dispose(): void {
        this.stopSweeper();
        this.rooms.clear();
        this.expiredListeners.clear();
    }

    private reserveCode(): string {
        for (let attempt = 0; attempt < this.maxCodeAttempts; attempt++) {
            const code = normalizeRoomCode(this.generateCode());
            if (!this.rooms.has(code)) return code;
        }

        throw new ConflictError('No se pudo generar un código de sala libre');
    }

    private log(message: string): void {
        if (!this.silent) console.log(message);
    }
}
