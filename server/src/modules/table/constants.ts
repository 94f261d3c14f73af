// TableInstance用定数定義

export const TABLE_CONSTANTS = {
  // テーブル設定
  MIN_PLAYERS: 2,
  MAX_PLAYERS: 9,
  // 2枚 × 23人 + ボード5枚 = 51 ≤ 52
  MAX_PLAYERS_LIMIT: 23,
  SMALL_BLIND: 10,
  BIG_BLIND: 20,
  STARTING_CHIPS: 1000,

  // タイミング
  START_DELAY_MS: 3000,  // 人数が揃ってからハンド開始までの猶予
} as const;
