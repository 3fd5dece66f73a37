// src/app.ts

import express from 'express';
import cors from 'cors';
import { errorMiddleware } from './middleware/error.middleware';
import { authMiddleware } from './middleware/auth.middleware';
import { createBattleRouter } from './routes/battle.routes';
import { BattleService } from './services/battle.service';
import { SessionProvider } from './services/session.service';
import { RoomBroadcaster } from './sockets/broadcaster';

export type AppDependencies = {
  battle: BattleService;
  sessions: SessionProvider;
  broadcaster: RoomBroadcaster;
  corsOrigin?: string;
};

/**
 * Crea y configura la aplicación Express
 */
export function createApp({ battle, sessions, broadcaster, corsOrigin = '*' }: AppDependencies) {
  const app = express();

  // Middleware global
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  app.get('/health', (_, res) => {
    res.json({ ok: true });
  });

  // Batalla de taps (requiere sesión)
  app.use('/api/battle', authMiddleware(sessions), createBattleRouter(battle, broadcaster));

  // Middleware global de errores
  app.use(errorMiddleware);

  return app;
}
