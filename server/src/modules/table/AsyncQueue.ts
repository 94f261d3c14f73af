// 非同期タスクの直列実行キュー
// テーブルの状態変更操作を全てキュー経由にすることで、レースコンディションを構造的に排除する

type QueueTask<T = void> = () => Promise<T>;

export class AsyncQueue {
  private queue: Array<() => Promise<void>> = [];
  private running = false;

  /**
   * タスクをキューに追加して順次実行する。
   * タスク完了時に結果を返す Promise を返す。
   */
  enqueue<T>(task: QueueTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        }
      });
      if (!this.running) {
        void this.processQueue();
      }
    });
  }

  // 再帰せずループで処理する（タスクは例外を外に出さない）
  private async processQueue(): Promise<void> {
    this.running = true;
    let entry = this.queue.shift();
    while (entry) {
      await entry();
      entry = this.queue.shift();
    }
    this.running = false;
  }

  /** キュー内の待機中タスク数（実行中含む） */
  get size(): number {
    return this.queue.length + (this.running ? 1 : 0);
  }
}
