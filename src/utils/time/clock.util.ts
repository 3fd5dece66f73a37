// src/utils/time/clock.util.ts

/**
 * Fuente de tiempo inyectable (ms desde epoch)
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Convierte un timestamp (ms) en ISO 8601, respetando null
 */
export function toIso(timestamp: number | null): string | null {
    return timestamp === null ? null : new Date(timestamp).toISOString();
}
