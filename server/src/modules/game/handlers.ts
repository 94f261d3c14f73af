import { Socket } from 'socket.io';
import { TableManager } from '../table/TableManager.js';
import { parseAction } from './validation.js';

export interface PlayerSocket extends Socket {
  playerName?: string;
  requestedTableId?: string;
  /** この接続が参加したテーブル。切断とアクションはこのテーブルに送る */
  tableId?: string;
}

/**
 * 接続時: テーブルを割り当て、参加をキューに入れる。
 * 同じ名前が既に別のテーブルにいる場合は拒否し、同じテーブルなら再接続として扱う。
 * 参加の enqueue は同期的に行い、同じ接続のメッセージが参加より先に処理されないようにする
 */
export function handleConnection(socket: PlayerSocket, tableManager: TableManager): void {
  const playerName = socket.playerName;
  if (!playerName) {
    console.warn(`[Socket] connection ${socket.id} without a player name, disconnecting`);
    socket.emit('error', { message: 'Missing player name' });
    socket.disconnect(true);
    return;
  }

  const current = tableManager.getPlayerTable(playerName);
  if (current && socket.requestedTableId && socket.requestedTableId !== current.id) {
    console.warn(`[Socket] ${playerName} is already at table ${current.id}, refusing table ${socket.requestedTableId}`);
    socket.emit('error', { message: `${playerName} is already playing at table ${current.id}` });
    socket.disconnect(true);
    return;
  }

  const table = current ?? tableManager.assignTable(socket.requestedTableId);
  socket.tableId = table.id;
  // 参加がキューで待っている間もテーブルが片付けられないよう、未追跡なら先に登録する
  if (!current) {
    tableManager.setPlayerTable(playerName, table.id);
  }
  console.log(`Player connected: ${playerName} -> table ${table.id}`);

  socket.emit('table_assigned', { table_id: table.id });

  socket.on('action', (data: unknown) => {
    handleGameAction(socket, playerName, data, tableManager).catch(err =>
      console.error(`[Socket] action from ${playerName} failed:`, err)
    );
  });

  socket.on('disconnect', () => {
    handleDisconnect(socket, playerName, tableManager).catch(err =>
      console.error(`Error during disconnect cleanup for ${playerName}:`, err)
    );
  });

  table
    .join(playerName, socket)
    .then(joined => {
      if (joined) return;
      socket.tableId = undefined;
      if (!current && tableManager.getPlayerTable(playerName) === table) {
        tableManager.removePlayerFromTracking(playerName);
      }
    })
    .catch(err => console.error(`[Socket] join of ${playerName} failed:`, err));
}

export async function handleGameAction(
  socket: PlayerSocket,
  playerName: string,
  data: unknown,
  tableManager: TableManager
): Promise<void> {
  const parsed = parseAction(data);
  if (!parsed.success) {
    socket.emit('error', { message: parsed.message });
    return;
  }

  const table = socket.tableId ? tableManager.getTable(socket.tableId) : undefined;
  if (!table) {
    socket.emit('error', { message: 'Not seated at a table' });
    return;
  }

  await table.handleAction(playerName, parsed.data);
}

export async function handleDisconnect(
  socket: PlayerSocket,
  playerName: string,
  tableManager: TableManager
): Promise<void> {
  console.log(`Player disconnected: ${playerName}`);

  const table = socket.tableId ? tableManager.getTable(socket.tableId) : undefined;
  if (!table) return;

  const removed = await table.leave(playerName, socket);
  if (removed && tableManager.getPlayerTable(playerName) === table) {
    tableManager.removePlayerFromTracking(playerName);
  }
  tableManager.cleanupEmptyTables();
}
