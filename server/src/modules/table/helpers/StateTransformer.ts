// GameState → クライアント向けペイロード変換（静的メソッド）

import { GameState, Player, PlayerAction } from '../../../shared/logic/types.js';
import { formatCard } from '../../../shared/logic/deck.js';
import { PublicPlayer, TableUpdatePayload, UpdatePayload } from '../../../shared/types/websocket.js';
import { SeatInfo } from '../types.js';

export class StateTransformer {
  /**
   * ホールカードを除いた公開情報
   */
  static toPublicPlayer(player: Player): PublicPlayer {
    return {
      name: player.name,
      chips: player.chips,
      current_bet: player.currentBet,
      active: player.active,
    };
  }

  static toUpdatePayload(state: GameState, message: string): UpdatePayload {
    const current = state.isHandComplete || state.currentPlayerIndex === -1
      ? null
      : state.players[state.currentPlayerIndex]?.name ?? null;

    return {
      message,
      players: state.players.map(p => this.toPublicPlayer(p)),
      pot: state.pot,
      phase: state.currentStreet,
      current_turn: current,
      community_cards: state.communityCards,
    };
  }

  static toTableUpdate(seated: readonly SeatInfo[], waiting: readonly SeatInfo[]): TableUpdatePayload {
    return {
      seated: seated.map(s => s.playerId),
      waiting: waiting.map(s => s.playerId),
    };
  }

  /**
   * 受理されたアクションの説明文。before はアクション前の状態
   */
  static describeAction(before: GameState, playerIndex: number, action: PlayerAction): string {
    const player = before.players[playerIndex];
    if (action.type === 'fold') {
      return `${player.name} folds`;
    }

    const required = before.currentBet - player.currentBet;
    if (action.amount === player.chips && action.amount > 0) {
      return `${player.name} goes all-in with ${action.amount}`;
    }
    if (action.amount === 0) {
      return `${player.name} checks`;
    }
    if (action.amount === required) {
      return `${player.name} calls ${action.amount}`;
    }
    if (before.currentBet === 0) {
      return `${player.name} bets ${action.amount}`;
    }
    return `${player.name} raises to ${player.currentBet + action.amount}`;
  }

  static describeStreet(state: GameState): string {
    const board = state.communityCards.map(formatCard).join(' ');
    switch (state.currentStreet) {
      case 'flop':
        return `Flop: ${board}`;
      case 'turn':
        return `Turn: ${board}`;
      case 'river':
        return `River: ${board}`;
      default:
        return `Board: ${board}`;
    }
  }

  static describeResult(state: GameState): string {
    if (state.winners.length === 0) {
      return 'Hand ended with no winner';
    }
    return state.winners
      .map(w => {
        const name = state.players[w.playerId].name;
        return w.handName ? `${name} wins ${w.amount} with ${w.handName}` : `${name} wins ${w.amount}`;
      })
      .join('; ');
  }
}
