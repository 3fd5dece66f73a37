// src/core/constants/index.ts

export * from './battle.constants';
export * from './socket.events';
