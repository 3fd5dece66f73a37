// src/services/session.service.ts

import { z } from 'zod';
import { SessionUser } from '../core/domain';
import { MAX_DISPLAY_NAME_LENGTH } from '../core/constants';
import { UnauthenticatedError } from '../core/errors/battle.errors';

/**
 * Credenciales tal como llegan del transporte (cabeceras HTTP o handshake del socket)
 */
export type SessionCredentials = {
    userId?: unknown;
    name?: unknown;
};

/**
 * Colaborador externo de sesión: identifica al usuario que hace la petición.
 * El registro, login y la base de datos de usuarios viven fuera de este servicio.
 */
export interface SessionProvider {
    authenticate(credentials: SessionCredentials): SessionUser;
}

const credentialsSchema = z.object({
    userId: z.union([z.string(), z.number()])
        .transform(value => String(value).trim())
        .pipe(z.string().min(1).max(64)),
    name: z.string().optional(),
});

/**
 * Confía en la identidad que fija el gateway de sesiones de la aplicación
 * (cabeceras x-user-id / x-user-name, o auth del handshake)
 */
export class TrustedHeaderSessionProvider implements SessionProvider {
    authenticate(credentials: SessionCredentials): SessionUser {
        const parsed = credentialsSchema.safeParse(credentials);
        if (!parsed.success) {
            throw new UnauthenticatedError();
        }

        const { userId, name } = parsed.data;
        return { id: userId, name: normalizeDisplayName(name, userId) };
    }
}

/**
 * Recorta el nombre visible; si viene vacío se usa el id
 */
export function normalizeDisplayName(name: string | undefined, fallback: string): string {
    const trimmed = (name ?? '').trim().slice(0, MAX_DISPLAY_NAME_LENGTH);
    return trimmed.length > 0 ? trimmed : fallback;
}
