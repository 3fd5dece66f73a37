// src/routes/battle.routes.ts

import { Router } from 'express';
import { BattleService } from '../services/battle.service';
import { RoomBroadcaster } from '../sockets/broadcaster';
import { requireUser } from '../middleware/auth.middleware';
import {
    JoinPayloadSchema,
    parsePayload,
    ReadyPayloadSchema,
    RoomCodePayloadSchema,
} from '../core/schemas/battle.schemas';

/**
 * Rutas HTTP de la batalla (/api/battle)
 * Requieren authMiddleware delante
 */
export function createBattleRouter(battle: BattleService, broadcaster: RoomBroadcaster): Router {
    const router = Router();

    router.post('/create', (req, res) => {
        const user = requireUser(req);
        const state = battle.createRoom(user);

        res.status(201).json({ message: 'Sala creada', code: state.code, state });
    });

    router.post('/join', (req, res) => {
        const user = requireUser(req);
        const { code, name } = parsePayload(JoinPayloadSchema, req.body);
        const state = battle.joinRoom(code, user, name ?? user.name);

        broadcaster.roomUpdated(state);
        res.json({ message: 'Te has unido a la sala', state });
    });

    router.post('/ready', (req, res) => {
        const user = requireUser(req);
        const { code, ready } = parsePayload(ReadyPayloadSchema, req.body);
        const state = battle.setReady(code, user.id, ready);

        broadcaster.roomUpdated(state);
        res.json({ message: 'Estado de listo actualizado', state });
    });

    router.post('/leave', (req, res) => {
        const user = requireUser(req);
        const { code } = parsePayload(RoomCodePayloadSchema, req.body);
        const result = battle.leaveRoom(code, user.id);

        if (result.state) {
            broadcaster.roomUpdated(result.state);
        } else {
            broadcaster.roomClosed(code, 'left');
        }

        const message = result.roomDeleted
            ? 'Sala disuelta'
            : result.ownerChanged ? 'Has salido de la sala, dueño transferido' : 'Has salido de la sala';
        res.json({ message, ...result });
    });

    router.post('/start', (req, res) => {
        const user = requireUser(req);
        const { code } = parsePayload(RoomCodePayloadSchema, req.body);
        const state = battle.startRound(code, user.id);

        broadcaster.roomUpdated(state);
        res.json({ message: '¡Ronda iniciada!', state });
    });

    router.post('/tap', (req, res) => {
        const user = requireUser(req);
        const { code } = parsePayload(RoomCodePayloadSchema, req.body);
        const { count, state } = battle.tap(code, user.id);

        broadcaster.roomUpdated(state);
        res.json({ message: 'Tap registrado', count, state });
    });

    router.post('/surrender', (req, res) => {
        const user = requireUser(req);
        const { code } = parsePayload(RoomCodePayloadSchema, req.body);
        const state = battle.surrender(code, user.id);

        broadcaster.roomUpdated(state);
        res.json({ message: 'Te has rendido', state });
    });

    router.get('/state', (req, res) => {
        requireUser(req);
        const { code } = parsePayload(RoomCodePayloadSchema, req.query);

        res.json({ state: battle.getState(code) });
    });

    router.get('/rooms', (req, res) => {
        requireUser(req);
        res.json({ rooms: battle.listOpenRooms() });
    });

    return router;
}
