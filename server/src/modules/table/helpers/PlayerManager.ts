// 着席/待機プレイヤー管理

import { LeaveResult, SeatInfo } from '../types.js';

export class PlayerManager {
  // ハンドに参加する順（ハンド中は固定）
  private seated: SeatInfo[] = [];
  // ハンド中に参加したプレイヤー（次のハンドから着席）
  private waiting: SeatInfo[] = [];

  getSeated(): readonly SeatInfo[] {
    return this.seated;
  }

  getWaiting(): readonly SeatInfo[] {
    return this.waiting;
  }

  getSeatedCount(): number {
    return this.seated.length;
  }

  /** 着席 + 待機の合計 */
  getTotalCount(): number {
    return this.seated.length + this.waiting.length;
  }

  isSeated(playerId: string): boolean {
    return this.seated.some(s => s.playerId === playerId);
  }

  isWaiting(playerId: string): boolean {
    return this.waiting.some(s => s.playerId === playerId);
  }

  has(playerId: string): boolean {
    return this.isSeated(playerId) || this.isWaiting(playerId);
  }

  /**
   * 着席させる。既にいる場合は何もしない
   * @returns 新たに追加したら true
   */
  seat(playerId: string, chips: number): boolean {
    if (this.has(playerId)) return false;
    this.seated.push({ playerId, chips });
    return true;
  }

  /**
   * 待機リストに追加する。既にいる場合は何もしない
   */
  addWaiting(playerId: string, chips: number): boolean {
    if (this.has(playerId)) return false;
    this.waiting.push({ playerId, chips });
    return true;
  }

  /**
   * 着席・待機の両方から取り除く
   */
  remove(playerId: string): LeaveResult | null {
    const seatIndex = this.seated.findIndex(s => s.playerId === playerId);
    if (seatIndex !== -1) {
      const [seat] = this.seated.splice(seatIndex, 1);
      return { ...seat, wasSeated: true };
    }
    const waitIndex = this.waiting.findIndex(s => s.playerId === playerId);
    if (waitIndex !== -1) {
      const [seat] = this.waiting.splice(waitIndex, 1);
      return { ...seat, wasSeated: false };
    }
    return null;
  }

  /**
   * ハンド終了時にチップを反映する（既に離席したプレイヤーは無視）
   */
  syncChips(results: ReadonlyArray<{ name: string; chips: number }>): void {
    for (const result of results) {
      const seat = this.seated.find(s => s.playerId === result.name);
      if (seat) {
        seat.chips = result.chips;
      }
    }
  }

  /**
   * チップが0になったプレイヤーを離席させる
   * @returns 離席させたプレイヤーID
   */
  removeBusted(): string[] {
    const busted = this.seated.filter(s => s.chips <= 0).map(s => s.playerId);
    this.seated = this.seated.filter(s => s.chips > 0);
    return busted;
  }

  /**
   * 待機プレイヤーを着席させ、待機リストを空にする
   * @returns 着席させたプレイヤーID
   */
  mergeWaiting(): string[] {
    const merged: string[] = [];
    for (const seat of this.waiting) {
      if (!this.isSeated(seat.playerId)) {
        this.seated.push(seat);
        merged.push(seat.playerId);
      }
    }
    this.waiting = [];
    return merged;
  }
}
