// src/middleware/error.middleware.ts

import { Request, Response, NextFunction } from 'express';
import { BattleError, BattleErrorCode } from '../core/errors/battle.errors';

/**
 * JSON mal formado que rechaza express.json()
 */
function isBodyParseError(err: unknown): boolean {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Middleware global para manejo de errores
 * Los errores de dominio se devuelven con su código; el resto es un 500
 */
export function errorMiddleware(
    err: unknown,
    _req: Request,
    res: Response,
    // Express reconoce el middleware de errores por sus 4 parámetros
    _next: NextFunction
): void {
    if (err instanceof BattleError) {
        res.status(err.status).json({ error: err.toJSON() });
        return;
    }

    if (isBodyParseError(err)) {
        res.status(400).json({
            error: { code: BattleErrorCode.VALIDATION, message: 'JSON inválido' }
        });
        return;
    }

    console.error('Error capturado:', err);

    res.status(500).json({
        error: {
            code: 'INTERNAL',
            message: err instanceof Error ? err.message : 'Something went wrong'
        }
    });
}
