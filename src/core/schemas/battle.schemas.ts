// src/core/schemas/battle.schemas.ts

/**
 * Esquemas de los payloads que envían los clientes (HTTP y Socket.IO)
 */

import { z } from 'zod';
import { MAX_DISPLAY_NAME_LENGTH, ROOM_CODE_LENGTH } from '../constants';
import { ValidationError } from '../errors/battle.errors';

export const RoomCodeSchema = z.string()
    .trim()
    .toUpperCase()
    .length(ROOM_CODE_LENGTH, { message: `El código debe tener ${ROOM_CODE_LENGTH} caracteres` });

export const RoomCodePayloadSchema = z.object({
    code: RoomCodeSchema,
});

export const JoinPayloadSchema = z.object({
    code: RoomCodeSchema,
    name: z.string().trim().min(1).max(MAX_DISPLAY_NAME_LENGTH).optional(),
});

export const ReadyPayloadSchema = z.object({
    code: RoomCodeSchema,
    ready: z.boolean().default(false),
});

/**
 * Valida un payload y convierte el fallo en ValidationError
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
    const result = schema.safeParse(data ?? {});
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue?.path.join('.') || 'payload';
        throw new ValidationError(`${field}: ${issue?.message ?? 'inválido'}`);
    }
    return result.data;
}
