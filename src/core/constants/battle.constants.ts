// src/core/constants/battle.constants.ts

/**
 * Constantes de la batalla de taps
 */

/**
 * Duración de una ronda (en segundos)
 */
export const ROUND_DURATION_SECONDS = 60;

/**
 * Longitud del código de sala generado
 */
export const ROOM_CODE_LENGTH = 6;

/**
 * Alfabeto del código de sala (sin I, O, 0 ni 1 para poder dictarlo)
 */
export const ROOM_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

/**
 * Intentos de generación de código antes de rendirse con Conflict
 */
export const MAX_CODE_ATTEMPTS = 10;

/**
 * Tiempo de inactividad tras el cual una sala se elimina (en minutos)
 */
export const ROOM_TTL_MINUTES = 5;

/**
 * Tiempo de inactividad tras el cual una sala se elimina (en milisegundos)
 */
export const ROOM_TTL_MS = ROOM_TTL_MINUTES * 60 * 1000;

/**
 * Intervalo del barrido periódico de salas (en milisegundos)
 */
export const SWEEP_INTERVAL_MS = 30 * 1000;

/**
 * Jugadores mínimos para poder iniciar una ronda
 */
export const MIN_PLAYERS_TO_START = 2;

/**
 * Longitud máxima del nombre visible de un jugador
 */
export const MAX_DISPLAY_NAME_LENGTH = 32;
