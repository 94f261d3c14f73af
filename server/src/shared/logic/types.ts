export type Suit = 'h' | 'd' | 'c' | 's'; // hearts, diamonds, clubs, spades
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | 'T' | 'J' | 'Q' | 'K' | 'A';

export interface Card {
  rank: Rank;
  suit: Suit;
}

export type Street = 'preflop' | 'flop' | 'turn' | 'river' | 'showdown';

// プレイヤーが送れるアクションは fold と bet のみ（check/call/raise は bet の額で表現する）
export type PlayerAction =
  | { type: 'fold' }
  | { type: 'bet'; amount: number };

export type ActionType = PlayerAction['type'];

export interface Player {
  id: number;                 // ハンド内の席インデックス
  name: string;               // プレイヤー識別子
  chips: number;
  holeCards: Card[];
  currentBet: number;         // 現在のベッティングラウンドでの投入額
  totalContribution: number;  // このハンド全体での投入額
  active: boolean;            // フォールドしたら false
  isAllIn: boolean;
  hasActed: boolean;          // 最後のレイズ以降にアクション済みか
}

export interface HandRank {
  rank: number; // 1=ハイカード, 2=ワンペア, ... 9=ストレートフラッシュ
  name: string;
  highCards: number[];
}

export interface SidePot {
  amount: number;
  eligiblePlayers: number[];
}

export interface Winner {
  playerId: number;
  amount: number;
  handName: string;
}

export interface ActionLogEntry {
  playerId: number;
  action: ActionType;
  amount: number;
  street: Street;
}

export interface GameState {
  players: Player[];
  deck: Card[];
  communityCards: Card[];
  pot: number;
  sidePots: SidePot[];
  currentStreet: Street;
  dealerPosition: number;
  currentPlayerIndex: number;   // -1 = 誰もアクションできない
  currentBet: number;           // このラウンドで全員が揃えるべき額
  smallBlind: number;
  bigBlind: number;
  handHistory: ActionLogEntry[];
  isHandComplete: boolean;
  winners: Winner[];
  unclaimedChips: number;       // 獲得資格者のいないポット層（未分配のまま保持）
}
