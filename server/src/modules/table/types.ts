// TableInstance用型定義

export interface TableConfig {
  minPlayers: number;
  maxPlayers: number;
  smallBlind: number;
  bigBlind: number;
  startingChips: number;
  startDelayMs: number;
}

export interface SeatInfo {
  playerId: string;
  chips: number;
}

// 離席処理の結果
export interface LeaveResult {
  playerId: string;
  wasSeated: boolean;
  chips: number;
}
