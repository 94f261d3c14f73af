import { Server } from 'socket.io';
import { TableManager } from '../table/TableManager.js';
import { handleConnection, PlayerSocket } from './handlers.js';
import { parseHandshake } from './validation.js';

/**
 * ハンドシェイクのクエリから参加者名と希望テーブルを取り出す
 */
export function handshakeMiddleware(socket: PlayerSocket, next: (err?: Error) => void): void {
  const parsed = parseHandshake(socket.handshake.query);
  if (!parsed.success) {
    console.warn(`[Socket] handshake rejected: ${parsed.message}`);
    next(new Error(parsed.message));
    return;
  }

  socket.playerName = parsed.data.name;
  socket.requestedTableId = parsed.data.tableId;
  next();
}

export function setupGameSocket(io: Server, tableManager: TableManager): void {
  io.use(handshakeMiddleware);

  io.on('connection', (socket: PlayerSocket) => {
    handleConnection(socket, tableManager);
  });
}
