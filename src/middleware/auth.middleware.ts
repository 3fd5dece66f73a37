// src/middleware/auth.middleware.ts

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { SessionUser } from '../core/domain';
import { UnauthenticatedError } from '../core/errors/battle.errors';
import { SessionProvider } from '../services/session.service';

declare global {
    namespace Express {
        interface Request {
            user?: SessionUser;
        }
    }
}

/**
 * Identifica al usuario con el colaborador de sesión y lo deja en req.user
 */
export function authMiddleware(sessions: SessionProvider): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            req.user = sessions.authenticate({
                userId: req.get('x-user-id'),
                name: req.get('x-user-name'),
            });
            next();
        } catch (err) {
            next(err);
        }
    };
}

/**
 * Usuario autenticado de la petición
 */
export function requireUser(req: Request): SessionUser {
    if (!req.user) throw new UnauthenticatedError();
    return req.user;
}
