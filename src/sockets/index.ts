// src/sockets/index.ts
import { Server } from 'socket.io';
import type { Server as HttpServer } from 'http';

import { BattleService } from '../services/battle.service';
import { SessionProvider } from '../services/session.service';
import { BattleError } from '../core/errors/battle.errors';
import { RoomBroadcaster } from './broadcaster';
import { registerBattleHandlers } from './handlers/battle.handlers';
import { registerConnectionHandlers } from './handlers/connection.handlers';
import { BattleServer, ClientToServerEvents, InterServerEvents, ServerToClientEvents, SocketData } from './socket.types';

export type SocketDependencies = {
    battle: BattleService;
    sessions: SessionProvider;
    broadcaster: RoomBroadcaster;
    corsOrigin?: string;
};

export function initSocket(server: HttpServer, { battle, sessions, broadcaster, corsOrigin = '*' }: SocketDependencies): BattleServer {
    const io: BattleServer = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, {
        cors: { origin: corsOrigin },
        // Configuración optimizada para móviles
        pingTimeout: 60000,          // 60 segundos antes de considerar desconexión
        pingInterval: 25000,          // Verificar conexión cada 25 segundos
        connectTimeout: 45000,        // 45 segundos para establecer conexión
        transports: ['websocket', 'polling'], // Usar WebSocket con fallback a polling
        allowUpgrades: true,          // Permitir upgrade de polling a websocket
        perMessageDeflate: false      // Desactivar compresión para mejor rendimiento en móvil
    });

    // Autenticación del handshake con el colaborador de sesión
    io.use((socket, next) => {
        try {
            const auth: Record<string, unknown> = socket.handshake.auth;
            socket.data.user = sessions.authenticate({ userId: auth.userId, name: auth.name });
            next();
        } catch (err) {
            if (err instanceof BattleError) {
                next(Object.assign(new Error(err.message), { data: err.toJSON() }));
                return;
            }
            next(err instanceof Error ? err : new Error(String(err)));
        }
    });

    broadcaster.attach(io);

    io.on('connection', (socket) => {
        console.log(`Socket conectado: ${socket.id} (${socket.data.user.name})`);

        // Handlers separados
        registerBattleHandlers(io, socket, battle, broadcaster);
        registerConnectionHandlers(io, socket, battle, broadcaster);
    });

    return io;
}
