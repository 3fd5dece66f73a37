// src/bootstrap.ts

import http from 'http';
import { createApp } from './app';
import { initSocket } from './sockets';
import { RoomBroadcaster } from './sockets/broadcaster';
import { BattleServer } from './sockets/socket.types';
import { ServerConfig } from './config/env.config';
import { RoomStore, RoomStoreOptions } from './services/room.store';
import { BattleService } from './services/battle.service';
import { SessionProvider, TrustedHeaderSessionProvider } from './services/session.service';

export type BattleServerOverrides = {
    store?: Omit<RoomStoreOptions, 'ttlMs' | 'sweepIntervalMs'>;
    sessions?: SessionProvider;
    silent?: boolean;
};

export type BattleServerContext = {
    store: RoomStore;
    battle: BattleService;
    broadcaster: RoomBroadcaster;
    server: http.Server;
    io: BattleServer;
    /** Empieza a escuchar y arranca el barrido periódico */
    listen(port?: number): Promise<number>;
    /** Cierra sockets, servidor HTTP y almacén */
    close(): Promise<void>;
};

function isServerNotRunning(err: Error): boolean {
    return 'code' in err && err.code === 'ERR_SERVER_NOT_RUNNING';
}

/**
 * Monta almacén, servicio, Express y Socket.IO sobre un mismo servidor HTTP
 */
export function createBattleServer(config: ServerConfig, overrides: BattleServerOverrides = {}): BattleServerContext {
    const silent = overrides.silent ?? false;

    const store = new RoomStore({
        ...overrides.store,
        ttlMs: config.roomTtlMs,
        sweepIntervalMs: config.sweepIntervalMs,
        silent,
    });
    const battle = new BattleService(store, { minPlayersToStart: config.minPlayersToStart, silent });
    const sessions = overrides.sessions ?? new TrustedHeaderSessionProvider();
    const broadcaster = new RoomBroadcaster();

    // Crear Express
    const app = createApp({ battle, sessions, broadcaster, corsOrigin: config.corsOrigin });

    // Crear servidor HTTP para Socket.IO
    const server = http.createServer(app);

    // Inicializar Socket.IO
    const io = initSocket(server, { battle, sessions, broadcaster, corsOrigin: config.corsOrigin });

    // Avisar a los clientes de las salas que caducan
    store.onExpired((codes) => {
        for (const code of codes) {
            broadcaster.roomClosed(code, 'expired');
        }
    });

    const listen = (port: number = config.port) =>
        new Promise<number>((resolve, reject) => {
            server.once('error', reject);
            server.listen(port, () => {
                server.off('error', reject);
                store.startSweeper();

                const address = server.address();
                resolve(typeof address === 'object' && address ? address.port : port);
            });
        });

    const close = () =>
        new Promise<void>((resolve, reject) => {
            store.dispose();
            broadcaster.detach();
            // io.close() también cierra el servidor HTTP
            io.close((err) => {
                if (err && !isServerNotRunning(err)) {
                    reject(err);
                    return;
                }
                resolve();
            });
        });

    return { store, battle, broadcaster, server, io, listen, close };
}
