// src/core/rules/battle.rules.ts

/**
 * Reglas de la batalla de taps
 * Máquina de estados waiting -> running -> finished, ranking y resultado
 */

import { BattleOutcome, FinishReason, Participant, RankingEntry, Room, RoomStatus } from '../domain';
import { InvalidStateError } from '../errors/battle.errors';

const STATUS_LABELS: Record<RoomStatus, string> = {
    waiting: 'en espera',
    running: 'en curso',
    finished: 'terminada',
};

/**
 * Instante (ms) en el que termina la ronda, o null si no ha empezado
 */
export function roundEndsAt(room: Room): number | null {
    if (room.startedAt === null) return null;
    return room.startedAt + room.durationSeconds * 1000;
}

/**
 * Lanza InvalidState si la sala no está en el estado esperado
 */
export function assertStatus(room: Room, expected: RoomStatus, action: string): void {
    if (room.status === expected) return;

    throw new InvalidStateError(
        `No puedes ${action}: la sala está ${STATUS_LABELS[room.status]}`
    );
}

/**
 * Participantes ordenados por taps (desc.), empate por orden de llegada
 */
export function rankParticipants(room: Room): Participant[] {
    return Array.from(room.participants.values()).sort(
        (a, b) => b.tapCount - a.tapCount || a.joinOrder - b.joinOrder
    );
}

export function buildRanking(room: Room): RankingEntry[] {
    return rankParticipants(room).map((p, index) => ({
        rank: index + 1,
        userId: p.userId,
        displayName: p.displayName,
        tapCount: p.tapCount,
        ready: p.ready,
        surrendered: p.surrendered,
    }));
}

/**
 * Participantes que siguen compitiendo (no se han rendido)
 */
export function activeParticipants(room: Room): Participant[] {
    return Array.from(room.participants.values()).filter(p => !p.surrendered);
}

/**
 * Calcula el resultado de la ronda
 * - timeout: gana el primero del ranking; empate en cabeza = sin ganador
 * - surrender: gana el único que no se rindió; si no queda nadie = empate
 */
export function computeOutcome(room: Room, reason: FinishReason): BattleOutcome {
    if (reason === 'surrender') {
        const remaining = activeParticipants(room);
        return {
            reason,
            winnerId: remaining.length === 1 ? remaining[0].userId : null,
        };
    }

    const [first, second] = rankParticipants(room);
    if (!first) return { reason, winnerId: null };
    if (second && second.tapCount === first.tapCount) return { reason, winnerId: null };

    return { reason, winnerId: first.userId };
}

/**
 * Pasa la sala a finished y congela el resultado
 */
export function finishRound(room: Room, reason: FinishReason, at: number): void {
    room.status = 'finished';
    room.finishedAt = at;
    room.outcome = computeOutcome(room, reason);
}

/**
 * Transición perezosa: si la ronda en curso ya agotó su tiempo, se marca
 * como terminada. Toda operación la aplica antes de nada.
 * @returns true si la sala acaba de terminar
 */
export function settleRoom(room: Room, now: number): boolean {
    const endsAt = roundEndsAt(room);
    if (room.status !== 'running' || endsAt === null) return false;
    if (now < endsAt) return false;

    finishRound(room, 'timeout', endsAt);
    return true;
}

/**
 * Línea de log de una ronda terminada
 */
export function describeFinish(room: Room): string {
    const winner = room.outcome?.winnerId ?? 'empate';
    return `🏆 Ronda terminada en la sala ${room.code} (${room.outcome?.reason}): ${winner}`;
}

/**
 * Segundos restantes de la ronda (0 si no está en curso)
 */
export function getSecondsRemaining(room: Room, now: number): number {
    if (room.status !== 'running' || room.startedAt === null) return 0;

    const elapsedSeconds = Math.floor((now - room.startedAt) / 1000);
    return Math.max(0, room.durationSeconds - elapsedSeconds);
}
