// プレイヤーID → ソケット接続

import { Socket } from 'socket.io';

export class ConnectionRegistry {
  private connections = new Map<string, Socket>();

  /** 再接続時は古い接続を置き換える */
  set(playerId: string, socket: Socket): void {
    this.connections.set(playerId, socket);
  }

  get(playerId: string): Socket | undefined {
    return this.connections.get(playerId);
  }

  delete(playerId: string): boolean {
    return this.connections.delete(playerId);
  }

  has(playerId: string): boolean {
    return this.connections.has(playerId);
  }

  entries(): Array<[string, Socket]> {
    return Array.from(this.connections.entries());
  }

  get size(): number {
    return this.connections.size;
  }
}
