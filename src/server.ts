// src/server.ts

import dotenv from 'dotenv';
dotenv.config();

import { createBattleServer } from './bootstrap';
import { loadConfig } from './config/env.config';

const config = loadConfig();
const context = createBattleServer(config);

// Arrancar servidor
context.listen()
    .then((port) => {
        console.log(`🚀 Servidor escuchando en http://localhost:${port} (${config.nodeEnv})`);
    })
    .catch((err: unknown) => {
        console.error('No se pudo arrancar el servidor:', err);
        process.exit(1);
    });

// Apagado ordenado
function shutdown(signal: NodeJS.Signals): void {
    console.log(`🛑 ${signal} recibido, cerrando servidor...`);
    context.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
            console.error('Error al cerrar el servidor:', err);
            process.exit(1);
        });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
