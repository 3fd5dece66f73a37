// src/core/constants/socket.events.ts

/**
 * Eventos de Socket.IO de la batalla de taps
 * Centralizados para evitar strings hardcodeados
 */

/**
 * Eventos que envía el cliente (todos responden por callback)
 */
export const BATTLE_EVENTS = {
    CREATE: 'battle:create',
    JOIN: 'battle:join',
    READY: 'battle:ready',
    LEAVE: 'battle:leave',
    START: 'battle:start',
    TAP: 'battle:tap',
    SURRENDER: 'battle:surrender',
    STATE: 'battle:state',
    LIST: 'battle:list',
} as const;

/**
 * Eventos que emite el servidor a la sala
 */
export const BROADCAST_EVENTS = {
    UPDATE: 'battle:update',
    CLOSED: 'battle:closed',
} as const;
