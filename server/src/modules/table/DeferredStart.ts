// 着席人数が揃ってからハンド開始までの猶予タイマー
// テーブルごとに1本だけ。待機中に再度 arm しても延長しない

export class DeferredStart {
  private timer: NodeJS.Timeout | null = null;

  /**
   * 開始タイマーをセットする。既にセット済みなら何もしない
   * @returns 新しくセットした場合 true
   */
  arm(delayMs: number, onFire: () => void): boolean {
    if (this.timer) return false;

    const timer = setTimeout(() => {
      if (this.timer !== timer) return;
      this.timer = null;
      onFire();
    }, delayMs);
    this.timer = timer;
    return true;
  }

  /** 発火前ならキャンセルして true */
  cancel(): boolean {
    if (!this.timer) return false;
    clearTimeout(this.timer);
    this.timer = null;
    return true;
  }

  get isPending(): boolean {
    return this.timer !== null;
  }
}
