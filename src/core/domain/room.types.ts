// src/core/domain/room.types.ts

import { Participant, RankingEntry } from './participant.types';

/**
 * Estados posibles de una sala
 */
export type RoomStatus =
    | "waiting"     // Esperando jugadores
    | "running"     // Ronda en curso
    | "finished";   // Ronda terminada (terminal)

/**
 * Motivo por el que terminó la ronda
 */
export type FinishReason = "timeout" | "surrender";

/**
 * Resultado de una ronda terminada (winnerId null = empate)
 */
export type BattleOutcome = {
    reason: FinishReason;
    winnerId: string | null;
};

/**
 * Representa una sala de batalla
 */
export type Room = {
    code: string;
    ownerId: string;            // solo el dueño puede iniciar la ronda
    ownerName: string;
    participants: Map<string, Participant>; // userId -> participante, en orden de llegada
    status: RoomStatus;
    durationSeconds: number;
    startedAt: number | null;   // timestamp (ms) al pasar a running
    finishedAt: number | null;  // timestamp (ms) al pasar a finished
    outcome: BattleOutcome | null;
    createdAt: number;
    lastActiveAt: number;       // se usa para la expiración
    nextJoinOrder: number;
};

/**
 * Estado público de una sala
 */
export type RoomSnapshot = {
    code: string;
    ownerId: string;
    ownerName: string;
    status: RoomStatus;
    durationSeconds: number;
    secondsRemaining: number;
    startedAt: string | null;   // ISO 8601
    finishedAt: string | null;  // ISO 8601
    ranking: RankingEntry[];
    outcome: BattleOutcome | null;
};

/**
 * Resumen de una sala abierta para el listado
 */
export type OpenRoomSummary = {
    code: string;
    ownerName: string;
    playerCount: number;
    createdAt: string;          // ISO 8601
};

/**
 * Resultado de abandonar una sala
 */
export type LeaveResult = {
    roomDeleted: boolean;
    ownerChanged: boolean;
    state: RoomSnapshot | null;
};
