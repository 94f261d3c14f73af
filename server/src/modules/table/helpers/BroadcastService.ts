// WebSocket通信ラッパー
// 接続ごとに送信し、失敗した接続だけをレジストリから外す（席はそのまま）

import { Socket } from 'socket.io';
import { ServerEventName, ServerEventPayload } from '../../../shared/types/websocket.js';
import { ConnectionRegistry } from './ConnectionRegistry.js';

export class BroadcastService {
  constructor(
    private connections: ConnectionRegistry,
    private tableId: string
  ) {}

  // テーブルの全接続に送信
  emitToTable<E extends ServerEventName>(event: E, data: ServerEventPayload<E>): void {
    for (const [playerId, socket] of this.connections.entries()) {
      this.deliver(playerId, socket, event, data);
    }
  }

  // 特定プレイヤーに送信
  emitToPlayer<E extends ServerEventName>(playerId: string, event: E, data: ServerEventPayload<E>): void {
    const socket = this.connections.get(playerId);
    if (!socket) {
      console.warn(`[Broadcast] table=${this.tableId} no connection for ${playerId}, dropping ${event}`);
      return;
    }
    this.deliver(playerId, socket, event, data);
  }

  private deliver<E extends ServerEventName>(
    playerId: string,
    socket: Socket,
    event: E,
    data: ServerEventPayload<E>
  ): void {
    try {
      if (!socket.connected) {
        throw new Error('socket is not connected');
      }
      socket.emit(event, data);
    } catch (err) {
      // 後から同じプレイヤーの新しい接続が登録されていたら消さない
      if (this.connections.get(playerId) === socket) {
        this.connections.delete(playerId);
      }
      console.warn(`[Broadcast] table=${this.tableId} pruned connection of ${playerId} after failed ${event}:`, err);
    }
  }
}
