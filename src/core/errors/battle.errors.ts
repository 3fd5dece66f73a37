// src/core/errors/battle.errors.ts

/**
 * Errores de la batalla de taps
 *
 * Los servicios lanzan estas clases; el middleware HTTP y los handlers de
 * Socket.IO las convierten en { error: { code, message } }.
 */

/**
 * Códigos de error que recibe el cliente
 */
export const BattleErrorCode = {
    ROOM_NOT_FOUND: 'ROOM_NOT_FOUND',
    FORBIDDEN: 'FORBIDDEN',
    INVALID_STATE: 'INVALID_STATE',
    CONFLICT: 'CONFLICT',
    UNAUTHENTICATED: 'UNAUTHENTICATED',
    VALIDATION: 'VALIDATION',
} as const;

export type BattleErrorCode = (typeof BattleErrorCode)[keyof typeof BattleErrorCode];

/**
 * Cuerpo de error serializado
 */
export type BattleErrorBody = {
    code: BattleErrorCode;
    message: string;
};

/**
 * Clase base de todos los errores de dominio
 */
export class BattleError extends Error {
    readonly code: BattleErrorCode;
    readonly status: number;

    constructor(code: BattleErrorCode, status: number, message: string) {
        super(message);
        this.code = code;
        this.status = status;
        this.name = 'BattleError';
    }

    toJSON(): BattleErrorBody {
        return { code: this.code, message: this.message };
    }
}

export class RoomNotFoundError extends BattleError {
    constructor(message = 'La sala no existe o ha expirado') {
        super(BattleErrorCode.ROOM_NOT_FOUND, 404, message);
        this.name = 'RoomNotFoundError';
    }
}

export class ForbiddenError extends BattleError {
    constructor(message = 'No tienes permiso para esta acción') {
        super(BattleErrorCode.FORBIDDEN, 403, message);
        this.name = 'ForbiddenError';
    }
}

export class InvalidStateError extends BattleError {
    constructor(message = 'La sala no admite esta acción ahora') {
        super(BattleErrorCode.INVALID_STATE, 400, message);
        this.name = 'InvalidStateError';
    }
}

export class ConflictError extends BattleError {
    constructor(message = 'Conflicto con el estado actual') {
        super(BattleErrorCode.CONFLICT, 409, message);
        this.name = 'ConflictError';
    }
}

export class UnauthenticatedError extends BattleError {
    constructor(message = 'Debes iniciar sesión') {
        super(BattleErrorCode.UNAUTHENTICATED, 401, message);
        this.name = 'UnauthenticatedError';
    }
}

export class ValidationError extends BattleError {
    constructor(message = 'Datos inválidos') {
        super(BattleErrorCode.VALIDATION, 400, message);
        this.name = 'ValidationError';
    }
}
