// src/core/domain/index.ts

/**
 * Módulo central de tipos de dominio de la batalla
 */

export * from './participant.types';
export * from './room.types';
