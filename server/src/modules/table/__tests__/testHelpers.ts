// TableInstance テスト用モック & ヘルパーユーティリティ

import { vi, type Mock } from 'vitest';
import type { Socket } from 'socket.io';
import type { Card } from '../../../shared/logic/types.js';
import { createDeck, RANKS, SUITS } from '../../../shared/logic/deck.js';
import type { TableConfig } from '../types.js';

// ============================================
// モックファクトリ
// ============================================

let socketCounter = 0;

type Listener = (data?: unknown) => void;

export interface MockConnection {
  socket: Socket;
  emit: Mock<(event: string, data?: unknown) => boolean>;
  disconnect: Mock<(close?: boolean) => void>;
  /** socket.on で登録されたハンドラ */
  handlers: Map<string, Listener>;
  setConnected(connected: boolean): void;
}

/** Socket オブジェクトのモック */
export function createMockConnection(query: Record<string, string> = {}): MockConnection {
  let connected = true;
  const handlers = new Map<string, Listener>();
  const emit = vi.fn<(event: string, data?: unknown) => boolean>().mockReturnValue(true);
  const disconnect = vi.fn<(close?: boolean) => void>();

  const socket = {
    id: `sock_${socketCounter++}`,
    get connected() {
      return connected;
    },
    handshake: { query },
    emit,
    disconnect,
    on: (event: string, listener: Listener) => {
      handlers.set(event, listener);
    },
  } as unknown as Socket;

  return {
    socket,
    emit,
    disconnect,
    handlers,
    setConnected: (value: boolean) => {
      connected = value;
    },
  };
}

/** ソケットカウンターをリセット（beforeEach用） */
export function resetSocketCounter(): void {
  socketCounter = 0;
}

// ============================================
// ヘルパー関数
// ============================================

/** socket.emit の特定イベントの引数を全て取得 */
export function getEmits(conn: MockConnection, eventName: string): unknown[] {
  return conn.emit.mock.calls
    .filter(([event]) => event === eventName)
    .map(([, data]) => data);
}

/** 特定イベントの最後の引数 */
export function lastEmit(conn: MockConnection, eventName: string): unknown {
  const emits = getEmits(conn, eventName);
  return emits[emits.length - 1];
}

export const TEST_CONFIG: TableConfig = {
  minPlayers: 2,
  maxPlayers: 4,
  smallBlind: 10,
  bigBlind: 20,
  startingChips: 1000,
  startDelayMs: 3000,
};

function card(str: string): Card {
  const rank = RANKS.find(r => r === str[0]);
  const suit = SUITS.find(s => s === str[1]);
  if (!rank || !suit) throw new Error(`bad card ${str}`);
  return { rank, suit };
}

/**
 * 配布順を固定したデッキ。
 * holesInDealOrder はディーラーの次から順に各プレイヤーの2枚
 */
export function stackedDeck(holesInDealOrder: string[], board: string): Card[] {
  const top = [...holesInDealOrder, board].flatMap(s => s.split(' ').map(card));
  const used = new Set(top.map(c => `${c.rank}${c.suit}`));
  return [...top, ...createDeck().filter(c => !used.has(`${c.rank}${c.suit}`))];
}
