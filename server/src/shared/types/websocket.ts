// WebSocket event types shared between client and server

import type { Card, Street } from '../logic/types.js';

// ========== Server -> Client Events ==========

export interface ServerToClientEvents {
  table_assigned: (data: { table_id: string }) => void;
  table_update: (data: TableUpdatePayload) => void;
  start: (data: { message: string }) => void;
  game_cancelled: (data: { message: string }) => void;
  update: (data: UpdatePayload) => void;
  // 本人のソケットにのみ送信
  hand: (data: { cards: Card[] }) => void;
  error: (data: { message: string }) => void;
  busted: (data: { message: string }) => void;
}

export type ServerEventName = keyof ServerToClientEvents;
export type ServerEventPayload<E extends ServerEventName> = Parameters<ServerToClientEvents[E]>[0];

// ========== Shared Types ==========

// ホールカードを含まない公開情報
export interface PublicPlayer {
  name: string;
  chips: number;
  current_bet: number;
  active: boolean;
}

export interface TableUpdatePayload {
  seated: string[];
  waiting: string[];
}

export interface UpdatePayload {
  message: string;
  players: PublicPlayer[];
  pot: number;
  phase: Street;
  current_turn: string | null;
  community_cards: Card[];
}

export interface TableInfo {
  id: string;
  name: string;
  blinds: string;
  players: number;
  waiting: number;
  maxPlayers: number;
  isHandInProgress: boolean;
}
