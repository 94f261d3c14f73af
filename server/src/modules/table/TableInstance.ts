import { Socket } from 'socket.io';
import { nanoid } from 'nanoid';
import { Card, GameState, PlayerAction } from '../../shared/logic/types.js';
import { createInitialGameState, startNewHand, takeAction, forceFold, abortHand } from '../../shared/logic/gameEngine.js';
import { createDeck, shuffleDeck } from '../../shared/logic/deck.js';
import { GameActionError } from '../../shared/logic/errors.js';
import { TableInfo } from '../../shared/types/websocket.js';

// ヘルパーモジュール
import { TABLE_CONSTANTS } from './constants.js';
import { LeaveResult, SeatInfo, TableConfig } from './types.js';
import { AsyncQueue } from './AsyncQueue.js';
import { DeferredStart } from './DeferredStart.js';
import { PlayerManager } from './helpers/PlayerManager.js';
import { ConnectionRegistry } from './helpers/ConnectionRegistry.js';
import { BroadcastService } from './helpers/BroadcastService.js';
import { StateTransformer } from './helpers/StateTransformer.js';

export const DEFAULT_TABLE_CONFIG: TableConfig = {
  minPlayers: TABLE_CONSTANTS.MIN_PLAYERS,
  maxPlayers: TABLE_CONSTANTS.MAX_PLAYERS,
  smallBlind: TABLE_CONSTANTS.SMALL_BLIND,
  bigBlind: TABLE_CONSTANTS.BIG_BLIND,
  startingChips: TABLE_CONSTANTS.STARTING_CHIPS,
  startDelayMs: TABLE_CONSTANTS.START_DELAY_MS,
};

export interface TableInstanceOptions {
  id?: string;
  /** ハンドごとのデッキ（省略時は新しいシャッフル済みデッキ） */
  deckFactory?: () => Card[];
  /** チップが尽きてテーブルから外されたときに呼ばれる */
  onPlayerRemoved?: (playerId: string) => void;
}

export interface TableSnapshot {
  seated: SeatInfo[];
  waiting: SeatInfo[];
  gameState: GameState | null;
}

export class TableInstance {
  public readonly id: string;
  public readonly config: TableConfig;

  private gameState: GameState | null = null;
  private dealerPosition = -1;
  private handNumber = 0;

  // ヘルパーインスタンス
  private readonly queue = new AsyncQueue();
  private readonly deferredStart = new DeferredStart();
  private readonly playerManager = new PlayerManager();
  private readonly connections = new ConnectionRegistry();
  private readonly broadcast: BroadcastService;
  private readonly deckFactory: () => Card[];
  private readonly onPlayerRemoved: (playerId: string) => void;

  constructor(config: TableConfig = DEFAULT_TABLE_CONFIG, options: TableInstanceOptions = {}) {
    this.id = options.id ?? nanoid(12);
    this.config = config;
    this.broadcast = new BroadcastService(this.connections, this.id);
    this.deckFactory = options.deckFactory ?? (() => shuffleDeck(createDeck()));
    this.onPlayerRemoved = options.onPlayerRemoved ?? (() => {});
  }

  // ============================================
  // Public methods（状態を変更する操作は全てキュー経由）
  // ============================================

  /**
   * プレイヤーを参加させる。ハンド中なら待機リストへ
   * @returns 満席で参加できなかった場合は false
   */
  public join(playerId: string, socket: Socket): Promise<boolean> {
    return this.queue.enqueue(async () => this.processJoin(playerId, socket));
  }

  /**
   * プレイヤーを離席させる（切断時）
   * socket を指定した場合、既に別の接続に置き換わっていれば何もしない
   */
  public leave(playerId: string, socket?: Socket): Promise<LeaveResult | null> {
    return this.queue.enqueue(async () => this.processLeave(playerId, socket));
  }

  public handleAction(playerId: string, action: PlayerAction): Promise<void> {
    return this.queue.enqueue(async () => this.guard('action', () => this.processAction(playerId, action)));
  }

  /** それまでにキューに入ったタスクが全て終わるまで待つ */
  public flush(): Promise<void> {
    return this.queue.enqueue(async () => {});
  }

  public dispose(): void {
    this.deferredStart.cancel();
  }

  public get isHandInProgress(): boolean {
    return this.gameState !== null;
  }

  public get isStartPending(): boolean {
    return this.deferredStart.isPending;
  }

  public getSnapshot(): TableSnapshot {
    return {
      seated: this.playerManager.getSeated().map(s => ({ ...s })),
      waiting: this.playerManager.getWaiting().map(s => ({ ...s })),
      gameState: this.gameState ? structuredClone(this.gameState) : null,
    };
  }

  /** 着席 + 待機の人数 */
  public getPlayerCount(): number {
    return this.playerManager.getTotalCount();
  }

  public hasAvailableSeat(): boolean {
    return this.playerManager.getTotalCount() < this.config.maxPlayers;
  }

  public getTableInfo(): TableInfo {
    return {
      id: this.id,
      name: `Table ${this.id}`,
      blinds: `${this.config.smallBlind}/${this.config.bigBlind}`,
      players: this.playerManager.getSeatedCount(),
      waiting: this.playerManager.getWaiting().length,
      maxPlayers: this.config.maxPlayers,
      isHandInProgress: this.isHandInProgress,
    };
  }

  // ============================================
  // Private methods
  // ============================================

  private processJoin(playerId: string, socket: Socket): boolean {
    const alreadyHere = this.playerManager.has(playerId);
    if (!alreadyHere && this.playerManager.getTotalCount() >= this.config.maxPlayers) {
      const error = new GameActionError('TABLE_FULL', `Table ${this.id} is full`);
      console.warn(`[Table ${this.id}] ${playerId} rejected: ${error.code}`);
      socket.emit('error', { message: error.message });
      return false;
    }

    this.connections.set(playerId, socket);

    if (alreadyHere) {
      console.log(`[Table ${this.id}] ${playerId} reconnected`);
    } else if (this.gameState) {
      this.playerManager.addWaiting(playerId, this.config.startingChips);
      console.log(`[Table ${this.id}] ${playerId} joined (waiting for next hand)`);
    } else {
      this.playerManager.seat(playerId, this.config.startingChips);
      console.log(`[Table ${this.id}] ${playerId} joined`);
    }

    this.broadcastTableUpdate();

    // ハンド中の再接続には現在の状況を送る
    if (this.gameState) {
      const state = this.gameState;
      const player = state.players.find(p => p.name === playerId);
      if (player) {
        this.broadcast.emitToPlayer(playerId, 'hand', { cards: player.holeCards });
      }
      this.broadcast.emitToPlayer(playerId, 'update', StateTransformer.toUpdatePayload(state, 'Hand in progress'));
    }

    this.maybeScheduleStart();
    return true;
  }

  private processLeave(playerId: string, socket?: Socket): LeaveResult | null {
    const current = this.connections.get(playerId);
    if (socket && current && current !== socket) {
      console.warn(`[Table ${this.id}] ignoring leave from a replaced connection of ${playerId}`);
      return null;
    }

    this.connections.delete(playerId);
    const removed = this.playerManager.remove(playerId);
    if (!removed) {
      console.warn(`[Table ${this.id}] leave: ${playerId} is not at this table`);
      return null;
    }

    console.log(`[Table ${this.id}] ${playerId} left`);
    this.broadcastTableUpdate();

    const seatedCount = this.playerManager.getSeatedCount();

    if (this.isStartPending && seatedCount < this.config.minPlayers) {
      this.deferredStart.cancel();
      console.log(`[Table ${this.id}] pending start cancelled (${seatedCount} seated)`);
      this.broadcast.emitToTable('game_cancelled', { message: 'Not enough players, game start cancelled' });
    }

    if (this.gameState && removed.wasSeated) {
      if (seatedCount < this.config.minPlayers) {
        this.abortCurrentHand('Not enough players, hand aborted');
      } else {
        const state = this.gameState;
        this.guard('leave', () => this.foldLeaver(state, playerId));
      }
    }

    return removed;
  }

  private foldLeaver(state: GameState, playerId: string): void {
    const playerIndex = state.players.findIndex(p => p.name === playerId);
    if (playerIndex === -1) return;

    this.gameState = forceFold(state, playerIndex);
    this.broadcastUpdate(`${playerId} left and folds`);

    if (this.gameState.isHandComplete) {
      this.finishHand();
    }
  }

  private processAction(playerId: string, action: PlayerAction): void {
    const state = this.gameState;
    if (!state) {
      this.sendError(playerId, new GameActionError('INVALID_ACTION', 'No hand in progress'));
      return;
    }

    const playerIndex = state.players.findIndex(p => p.name === playerId);
    if (playerIndex === -1) {
      this.sendError(playerId, new GameActionError('INVALID_ACTION', 'You are not playing this hand'));
      return;
    }

    const result = takeAction(state, playerIndex, action);
    if (!result.success) {
      this.sendError(playerId, result.error);
      return;
    }

    let message = StateTransformer.describeAction(state, playerIndex, action);
    this.gameState = result.gameState;

    if (result.handComplete) {
      this.broadcastUpdate(message);
      this.finishHand();
      return;
    }

    if (result.streetChanged) {
      message = `${message}. ${StateTransformer.describeStreet(result.gameState)}`;
    }
    this.broadcastUpdate(message);
  }

  /**
   * 着席人数が揃っていて、ハンドも開始予定もなければ開始タイマーをセットする
   */
  private maybeScheduleStart(): void {
    if (this.gameState || this.isStartPending) return;
    if (this.playerManager.getSeatedCount() < this.config.minPlayers) return;

    console.log(`[Table ${this.id}] hand starts in ${this.config.startDelayMs}ms`);
    this.deferredStart.arm(this.config.startDelayMs, () => {
      this.queue
        .enqueue(async () => this.guard('deferred start', () => this.startDeferredHand()))
        .catch(err => console.error(`[Table ${this.id}] deferred start task failed:`, err));
    });
  }

  // タイマー発火からタスク実行までの間に状況が変わっている可能性があるので再確認する
  private startDeferredHand(): void {
    if (this.gameState) return;
    if (this.playerManager.getSeatedCount() < this.config.minPlayers) {
      console.log(`[Table ${this.id}] deferred start skipped: not enough players`);
      this.broadcast.emitToTable('game_cancelled', { message: 'Not enough players, game start cancelled' });
      return;
    }
    this.startHand();
  }

  private startHand(): void {
    this.deferredStart.cancel();

    const seated = this.playerManager.getSeated();
    const initial = createInitialGameState(
      seated.map(s => ({ name: s.playerId, chips: s.chips })),
      { smallBlind: this.config.smallBlind, bigBlind: this.config.bigBlind, dealerPosition: this.dealerPosition }
    );
    const state = startNewHand(initial, this.deckFactory());

    this.gameState = state;
    this.dealerPosition = state.dealerPosition;
    this.handNumber++;

    const names = state.players.map(p => p.name);
    console.log(`[Table ${this.id}] hand #${this.handNumber} started: ${names.join(', ')}`);

    this.broadcast.emitToTable('start', {
      message: `Hand #${this.handNumber} starting with ${names.join(', ')}`,
    });
    for (const player of state.players) {
      this.broadcast.emitToPlayer(player.name, 'hand', { cards: player.holeCards });
    }

    const dealer = state.players[state.dealerPosition].name;
    this.broadcastUpdate(`Dealer: ${dealer}. Blinds ${state.smallBlind}/${state.bigBlind}`);

    if (state.isHandComplete) {
      this.finishHand();
    }
  }

  /**
   * ハンド終了: 結果を送信し、チップを反映、破産者の退席、待機者の着席を行う
   * 人数が揃っていれば待たずに次のハンドを開始する
   */
  private finishHand(): void {
    const state = this.gameState;
    if (!state) return;

    this.broadcastUpdate(StateTransformer.describeResult(state));
    if (state.unclaimedChips > 0) {
      console.warn(`[Table ${this.id}] ${state.unclaimedChips} chips left unclaimed in hand #${this.handNumber}`);
    }
    console.log(`[Table ${this.id}] hand #${this.handNumber} finished`);

    this.playerManager.syncChips(state.players);
    this.gameState = null;

    this.removeBustedPlayers();
    this.playerManager.mergeWaiting();
    this.broadcastTableUpdate();

    if (this.playerManager.getSeatedCount() >= this.config.minPlayers) {
      this.startHand();
    } else {
      console.log(`[Table ${this.id}] idle (${this.playerManager.getSeatedCount()} seated)`);
    }
  }

  private removeBustedPlayers(): void {
    for (const playerId of this.playerManager.removeBusted()) {
      console.log(`[Table ${this.id}] ${playerId} busted`);
      this.broadcast.emitToPlayer(playerId, 'busted', { message: 'You are out of chips' });
      this.connections.delete(playerId);
      this.onPlayerRemoved(playerId);
    }
  }

  /**
   * 進行中のハンドを中断して投入額を返却する
   */
  private abortCurrentHand(reason: string): void {
    const state = this.gameState;
    if (!state) return;

    const refunded = abortHand(state);
    this.playerManager.syncChips(refunded.players);
    this.gameState = null;
    console.log(`[Table ${this.id}] hand #${this.handNumber} aborted: ${reason}`);
    this.broadcast.emitToTable('error', { message: reason });

    this.playerManager.mergeWaiting();
    this.broadcastTableUpdate();
    this.maybeScheduleStart();
  }

  /**
   * テーブル内部の例外はそのテーブルのハンドだけを中断する
   */
  private guard(label: string, task: () => void): void {
    try {
      task();
    } catch (err) {
      console.error(`[Table ${this.id}] ${label} failed:`, err);
      if (this.gameState) {
        this.abortCurrentHand('Internal error, hand aborted');
      }
    }
  }

  private sendError(playerId: string, error: GameActionError): void {
    console.warn(`[Table ${this.id}] ${playerId}: ${error.code}`);
    this.broadcast.emitToPlayer(playerId, 'error', { message: error.message });
  }

  private broadcastUpdate(message: string): void {
    if (!this.gameState) return;
    this.broadcast.emitToTable('update', StateTransformer.toUpdatePayload(this.gameState, message));
  }

  private broadcastTableUpdate(): void {
    this.broadcast.emitToTable(
      'table_update',
      StateTransformer.toTableUpdate(this.playerManager.getSeated(), this.playerManager.getWaiting())
    );
  }
}
