// プレイヤー起因のエラー（本人にのみ通知し、状態は変更しない）
export type GameActionErrorCode =
  | 'NOT_YOUR_TURN'
  | 'BELOW_MINIMUM_BET'
  | 'INSUFFICIENT_CHIPS'
  | 'INVALID_ACTION'
  | 'TABLE_FULL';

export class GameActionError extends Error {
  readonly code: GameActionErrorCode;

  constructor(code: GameActionErrorCode, message: string) {
    super(message);
    this.name = 'GameActionError';
    this.code = code;
  }
}

// 内部不変条件の破綻。該当ハンドのみ中断させる
export class EmptyDeckError extends Error {
  readonly requested: number;
  readonly remaining: number;

  constructor(requested: number, remaining: number) {
    super(`Cannot draw ${requested} card(s): only ${remaining} left in the deck`);
    this.name = 'EmptyDeckError';
    this.requested = requested;
    this.remaining = remaining;
  }
}
