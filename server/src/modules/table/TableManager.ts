import { TableInstance, TableInstanceOptions, DEFAULT_TABLE_CONFIG } from './TableInstance.js';
import { TableConfig } from './types.js';
import { TableInfo } from '../../shared/types/websocket.js';

// テーブル単位ではなく全テーブル共通のオプション
export type TableManagerOptions = Pick<TableInstanceOptions, 'deckFactory'>;

export class TableManager {
  private tables: Map<string, TableInstance> = new Map();
  private playerTables: Map<string, string> = new Map(); // playerId -> tableId

  constructor(
    private readonly config: TableConfig = DEFAULT_TABLE_CONFIG,
    private readonly options: TableManagerOptions = {}
  ) {}

  // Create a new table
  public createTable(id?: string): TableInstance {
    const table: TableInstance = new TableInstance(this.config, {
      ...this.options,
      id,
      // 破産して外されたプレイヤーの追跡をやめる
      onPlayerRemoved: playerId => {
        if (this.playerTables.get(playerId) === table.id) {
          this.playerTables.delete(playerId);
        }
      },
    });
    this.tables.set(table.id, table);
    console.log(`[TableManager] table ${table.id} created`);
    return table;
  }

  // Get a table by ID
  public getTable(tableId: string): TableInstance | undefined {
    return this.tables.get(tableId);
  }

  // 着席人数が最も少ない、空席のあるテーブル
  public findAvailableTable(): TableInstance | null {
    let best: TableInstance | null = null;
    let bestCount = Infinity;

    for (const table of this.tables.values()) {
      if (!table.hasAvailableSeat()) continue;
      const count = table.getPlayerCount();
      if (count < bestCount) {
        bestCount = count;
        best = table;
      }
    }
    return best;
  }

  /**
   * 参加先のテーブルを決める。
   * tableId 指定時はそのテーブル（なければ作成）、未指定なら空いているテーブルか新規テーブル
   */
  public assignTable(tableId?: string): TableInstance {
    if (tableId) {
      return this.tables.get(tableId) ?? this.createTable(tableId);
    }
    return this.findAvailableTable() ?? this.createTable();
  }

  // Remove a table
  public removeTable(tableId: string): void {
    const table = this.tables.get(tableId);
    if (!table) {
      console.warn(`[TableManager] removeTable: table ${tableId} not found`);
      return;
    }
    table.dispose();
    this.tables.delete(tableId);
    console.log(`[TableManager] table ${tableId} removed`);
  }

  // Get all tables info for lobby
  public getTablesInfo(): TableInfo[] {
    return Array.from(this.tables.values()).map(t => t.getTableInfo());
  }

  // Track player's current table
  public setPlayerTable(playerId: string, tableId: string): void {
    this.playerTables.set(playerId, tableId);
  }

  // Get player's current table
  public getPlayerTable(playerId: string): TableInstance | undefined {
    const tableId = this.playerTables.get(playerId);
    if (!tableId) return undefined;
    return this.tables.get(tableId);
  }

  // Remove player from tracking
  public removePlayerFromTracking(playerId: string): void {
    this.playerTables.delete(playerId);
  }

  // Clean up empty tables (keep one for new players)
  // 参加処理がキューで待っているテーブルは追跡中のプレイヤーがいるので消さない
  public cleanupEmptyTables(): void {
    const trackedTableIds = new Set(this.playerTables.values());
    const emptyTables = Array.from(this.tables.values())
      .filter(t => t.getPlayerCount() === 0 && !trackedTableIds.has(t.id));
    for (let i = 1; i < emptyTables.length; i++) {
      this.removeTable(emptyTables[i].id);
    }
  }
}
