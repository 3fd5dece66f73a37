// src/utils/generators/id.generator.ts

/**
 * Utilidades para generación de identificadores únicos
 */

import { randomInt } from 'crypto';
import { ROOM_CODE_ALPHABET, ROOM_CODE_LENGTH } from '../../core/constants';

/**
 * Genera un código de sala aleatorio
 * @param length Longitud del código (por defecto 6)
 * @param alphabet Caracteres permitidos
 * @returns Código de sala en mayúsculas
 * @example generateRoomCode() // "K7QZ2M"
 */
export function generateRoomCode(length = ROOM_CODE_LENGTH, alphabet = ROOM_CODE_ALPHABET): string {
    let code = '';
    for (let i = 0; i < length; i++) {
        code += alphabet[randomInt(alphabet.length)];
    }
    return code;
}

/**
 * Normaliza un código introducido por el usuario
 * @example normalizeRoomCode(" k7qz2m ") // "K7QZ2M"
 */
export function normalizeRoomCode(code: string): string {
    return code.trim().toUpperCase();
}
