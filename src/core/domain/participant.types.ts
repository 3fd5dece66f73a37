// src/core/domain/participant.types.ts

/**
 * Usuario autenticado tal como lo entrega el colaborador de sesión
 */
export type SessionUser = {
    id: string;         // identificador estable del usuario
    name: string;       // nombre visible
};

/**
 * Representa un participante de una sala de batalla
 */
export type Participant = {
    userId: string;
    displayName: string;
    tapCount: number;       // taps aceptados en la ronda
    joinOrder: number;      // orden de llegada, desempata el ranking
    joinedAt: number;       // timestamp (ms)
    ready: boolean;         // marca informativa en la sala de espera
    surrendered: boolean;   // se rindió durante la ronda
};

/**
 * Entrada del ranking público
 */
export type RankingEntry = {
    rank: number;           // posición 1..n
    userId: string;
    displayName: string;
    tapCount: number;
    ready: boolean;
    surrendered: boolean;
};
