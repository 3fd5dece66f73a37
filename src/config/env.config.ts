// src/config/env.config.ts

/**
 * Configuración de variables de entorno
 */

import {
    MIN_PLAYERS_TO_START as DEFAULT_MIN_PLAYERS,
    ROOM_TTL_MS,
    SWEEP_INTERVAL_MS,
} from '../core/constants';

/**
 * Lee un entero positivo; si falta o no es válido devuelve el valor por defecto
 */
export function readPositiveInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;

    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export type ServerConfig = {
    port: number;
    nodeEnv: string;
    corsOrigin: string;
    roomTtlMs: number;
    sweepIntervalMs: number;
    minPlayersToStart: number;
};

/**
 * Construye la configuración a partir de un entorno (process.env por defecto)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    return {
        port: readPositiveInt(env.PORT, 3000),
        nodeEnv: env.NODE_ENV || 'development',
        corsOrigin: env.CORS_ORIGIN || '*',
        roomTtlMs: readPositiveInt(env.ROOM_TTL_SECONDS, ROOM_TTL_MS / 1000) * 1000,
        sweepIntervalMs: readPositiveInt(env.SWEEP_INTERVAL_SECONDS, SWEEP_INTERVAL_MS / 1000) * 1000,
        minPlayersToStart: readPositiveInt(env.MIN_PLAYERS_TO_START, DEFAULT_MIN_PLAYERS),
    };
}
