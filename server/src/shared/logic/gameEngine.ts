import { Card, GameState, Player, PlayerAction, SidePot, Winner } from './types.js';
import { createDeck, shuffleDeck, dealCards } from './deck.js';
import { evaluateHand, compareHands } from './handEvaluator.js';
import { GameActionError } from './errors.js';

export interface SeatedPlayer {
  name: string;
  chips: number;
}

export interface HandOptions {
  smallBlind: number;
  bigBlind: number;
  /** 前のハンドのディーラー位置（startNewHand で1つ進む）。初回は -1 */
  dealerPosition?: number;
}

export type ActionResult =
  | { success: true; gameState: GameState; streetChanged: boolean; handComplete: boolean }
  | { success: false; error: GameActionError };

/**
 * ハンド開始前の状態を作成する
 * @param seated 着席順のプレイヤー（ハンド中は固定）
 */
export function createInitialGameState(seated: SeatedPlayer[], options: HandOptions): GameState {
  const players: Player[] = seated.map((s, i) => ({
    id: i,
    name: s.name,
    chips: s.chips,
    holeCards: [],
    currentBet: 0,
    totalContribution: 0,
    active: true,
    isAllIn: false,
    hasActed: false,
  }));

  return {
    players,
    deck: [],
    communityCards: [],
    pot: 0,
    sidePots: [],
    currentStreet: 'preflop',
    dealerPosition: options.dealerPosition ?? -1,
    currentPlayerIndex: -1,
    currentBet: 0,
    smallBlind: options.smallBlind,
    bigBlind: options.bigBlind,
    handHistory: [],
    isHandComplete: false,
    winners: [],
    unclaimedChips: 0,
  };
}

/**
 * 新しいハンドを開始する
 * デッキのシャッフル、ディーラー移動、カード配布、ブラインド投稿を行う
 * @param deck テスト等で配布順を固定したい場合に指定（省略時は新しいシャッフル済みデッキ）
 */
export function startNewHand(state: GameState, deck: Card[] = shuffleDeck(createDeck())): GameState {
  const count = state.players.length;
  if (count < 2) {
    throw new Error(`startNewHand requires at least 2 players, got ${count}`);
  }

  const newState = structuredClone(state);

  // === ハンド状態のリセット ===
  newState.deck = [...deck];
  newState.communityCards = [];
  newState.pot = 0;
  newState.sidePots = [];
  newState.currentStreet = 'preflop';
  newState.handHistory = [];
  newState.isHandComplete = false;
  newState.winners = [];
  newState.unclaimedChips = 0;

  // === プレイヤー状態のリセット ===
  newState.players = newState.players.map(p => ({
    ...p,
    holeCards: [],
    currentBet: 0,
    totalContribution: 0,
    active: true,
    isAllIn: p.chips === 0,
    hasActed: false,
  }));

  // === ディーラーボタンを移動 ===
  newState.dealerPosition = (Math.max(newState.dealerPosition, -1) + 1) % count;
  const dealer = newState.dealerPosition;

  // === カードを配る（ディーラーの次から2枚ずつ）===
  for (let i = 1; i <= count; i++) {
    const player = newState.players[(dealer + i) % count];
    const { cards, remainingDeck } = dealCards(newState.deck, 2);
    player.holeCards = cards;
    newState.deck = remainingDeck;
  }

  // === ブラインド位置の決定 ===
  // Heads-up（2人）: ディーラーが SB を兼ね、相手が BB
  // 3人以上: ディーラーの次が SB、その次が BB
  const isHeadsUp = count === 2;
  const sbIndex = isHeadsUp ? dealer : (dealer + 1) % count;
  const bbIndex = isHeadsUp ? (dealer + 1) % count : (dealer + 2) % count;

  postBlind(newState, sbIndex, newState.smallBlind);
  postBlind(newState, bbIndex, newState.bigBlind);

  // ショートスタックの BB でもターゲットは BB 額
  newState.currentBet = newState.bigBlind;

  // === アクション開始位置 ===
  // Heads-up はディーラー（SB）から、3人以上は BB の次（dealer+3）から
  const firstActor = isHeadsUp ? sbIndex : (dealer + 3) % count;

  // ブラインドだけで全員オールインなどアクション不要な場合はそのまま進める
  if (nothingLeftToBet(newState)) {
    return moveToNextStreet(newState);
  }

  newState.currentPlayerIndex = canAct(newState.players[firstActor])
    ? firstActor
    : getNextActivePlayer(newState, firstActor);
  return newState;
}

function postBlind(state: GameState, playerIndex: number, blind: number): void {
  const player = state.players[playerIndex];
  const amount = Math.min(blind, player.chips);
  player.chips -= amount;
  player.currentBet += amount;
  player.totalContribution += amount;
  state.pot += amount;
  if (player.chips === 0) player.isAllIn = true;
}

function canAct(player: Player): boolean {
  return player.active && !player.isAllIn;
}

/**
 * fromIndex の次から時計回りに、アクション可能なプレイヤーを探す
 * @returns プレイヤーインデックス、見つからない場合は-1
 */
function getNextActivePlayer(state: GameState, fromIndex: number): number {
  const count = state.players.length;
  for (let i = 1; i <= count; i++) {
    const index = (fromIndex + i) % count;
    if (canAct(state.players[index])) return index;
  }
  return -1;
}

/**
 * ベットで争う相手がいない（アクション可能なのが0人、または1人で既に額を揃えている）
 */
function nothingLeftToBet(state: GameState): boolean {
  const playersWhoCanAct = getPlayersWhoCanAct(state);
  if (playersWhoCanAct.length === 0) return true;
  return playersWhoCanAct.length === 1 && playersWhoCanAct[0].currentBet >= state.currentBet;
}

/**
 * フォールドしていないプレイヤー一覧
 */
export function getActivePlayers(state: GameState): Player[] {
  return state.players.filter(p => p.active);
}

/**
 * アクション可能なプレイヤー一覧（フォールドしておらず、オールインでもない）
 */
export function getPlayersWhoCanAct(state: GameState): Player[] {
  return state.players.filter(canAct);
}

/**
 * アクティブプレイヤー全員の currentBet が同じなら true（オールインのプレイヤーも含む）
 */
export function isBettingRoundComplete(state: GameState): boolean {
  const bets = getActivePlayers(state).map(p => p.currentBet);
  return bets.every(bet => bet === bets[0]);
}

// 進行判定用: オールインのプレイヤーはそれ以上揃えられないので除いて比べる
function betsMatchedAmongActors(state: GameState): boolean {
  const bets = getPlayersWhoCanAct(state).map(p => p.currentBet);
  return bets.every(bet => bet === bets[0]);
}

/**
 * アクションを検証する。問題なければ null
 */
export function validateAction(state: GameState, playerIndex: number, action: PlayerAction): GameActionError | null {
  if (state.isHandComplete) {
    return new GameActionError('INVALID_ACTION', 'The hand is over');
  }

  if (state.currentPlayerIndex !== playerIndex) {
    return new GameActionError('NOT_YOUR_TURN', 'It is not your turn');
  }

  const player = state.players[playerIndex];

  switch (action.type) {
    case 'fold':
      return null;

    case 'bet': {
      if (!Number.isInteger(action.amount) || action.amount < 0) {
        return new GameActionError('INVALID_ACTION', 'Bet amount must be a non-negative integer');
      }
      const required = Math.max(0, state.currentBet - player.currentBet);
      // 全額オールインなら最低額未満でも認める
      if (action.amount < required && action.amount !== player.chips) {
        return new GameActionError('BELOW_MINIMUM_BET', `You must bet at least ${required}`);
      }
      if (action.amount > player.chips) {
        return new GameActionError('INSUFFICIENT_CHIPS', `You only have ${player.chips} chips`);
      }
      return null;
    }

    default: {
      const unknown: never = action;
      return new GameActionError('INVALID_ACTION', `Unknown action ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * アクションを検証して適用する。拒否された場合は状態を変更しない
 */
export function takeAction(state: GameState, playerIndex: number, action: PlayerAction): ActionResult {
  const error = validateAction(state, playerIndex, action);
  if (error) {
    return { success: false, error };
  }

  const newState = applyAction(state, playerIndex, action);
  return {
    success: true,
    gameState: newState,
    streetChanged: newState.currentStreet !== state.currentStreet,
    handComplete: newState.isHandComplete,
  };
}

/**
 * 検証済みのアクションをゲーム状態に適用する
 * @returns 更新されたGameState（元の state は変更しない）
 */
export function applyAction(state: GameState, playerIndex: number, action: PlayerAction): GameState {
  const newState = structuredClone(state);
  const player = newState.players[playerIndex];

  player.hasActed = true;
  let amount = 0;

  switch (action.type) {
    case 'fold':
      player.active = false;
      break;

    case 'bet': {
      amount = action.amount;
      player.chips -= amount;
      player.currentBet += amount;
      player.totalContribution += amount;
      newState.pot += amount;
      if (player.chips === 0) player.isAllIn = true;

      if (player.currentBet > newState.currentBet) {
        newState.currentBet = player.currentBet;
        // レイズがあったら他のプレイヤーに再度アクションの機会を与える
        for (const p of newState.players) {
          if (p.id !== player.id && canAct(p)) {
            p.hasActed = false;
          }
        }
      }
      break;
    }
  }

  newState.handHistory.push({ playerId: playerIndex, action: action.type, amount, street: state.currentStreet });

  return resolveAfterAction(newState);
}

/**
 * アクション後の進行（次の手番、ストリート移動、勝者決定）
 */
function resolveAfterAction(state: GameState): GameState {
  const next = determineNextAction(state);
  if (next.moveToNextStreet) {
    return moveToNextStreet(state);
  }
  if (next.nextPlayerIndex === -1) {
    return determineWinner(state);
  }
  state.currentPlayerIndex = next.nextPlayerIndex;
  return state;
}

/**
 * 次にアクションすべきプレイヤーを決定する
 * @returns nextPlayerIndex: 次のプレイヤー（-1なら終了）, moveToNextStreet: 次のストリートに進むか
 */
function determineNextAction(state: GameState): { nextPlayerIndex: number; moveToNextStreet: boolean } {
  // 1人しか残っていない → ハンド終了
  if (getActivePlayers(state).length <= 1) {
    return { nextPlayerIndex: -1, moveToNextStreet: false };
  }

  // 全員オールインかフォールド → ボードをランアウト
  if (nothingLeftToBet(state)) {
    return { nextPlayerIndex: -1, moveToNextStreet: true };
  }

  const playersWhoCanAct = getPlayersWhoCanAct(state);

  // ラウンド終了: 全員がアクション済み、かつ投入額が揃っている
  const allActed = playersWhoCanAct.every(p => p.hasActed);
  const matchedTarget = playersWhoCanAct.every(p => p.currentBet >= state.currentBet);
  if (allActed && matchedTarget && betsMatchedAmongActors(state)) {
    return { nextPlayerIndex: -1, moveToNextStreet: true };
  }

  // 現在の手番の次から、アクションが必要なプレイヤーを探す
  const count = state.players.length;
  for (let i = 1; i <= count; i++) {
    const index = (state.currentPlayerIndex + i) % count;
    const p = state.players[index];
    if (canAct(p) && (!p.hasActed || p.currentBet < state.currentBet)) {
      return { nextPlayerIndex: index, moveToNextStreet: false };
    }
  }

  return { nextPlayerIndex: -1, moveToNextStreet: true };
}

/**
 * 次のストリート（フロップ/ターン/リバー/ショーダウン）へ進む
 */
function moveToNextStreet(state: GameState): GameState {
  const newState = structuredClone(state);

  // ストリート間でベット状態をリセット
  for (const p of newState.players) {
    p.currentBet = 0;
    p.hasActed = false;
  }
  newState.currentBet = 0;

  if (getActivePlayers(newState).length <= 1) {
    return determineWinner(newState);
  }

  // === コミュニティカードを配る ===
  switch (newState.currentStreet) {
    case 'preflop':
      newState.currentStreet = 'flop';
      dealCommunity(newState, 3);
      break;
    case 'flop':
      newState.currentStreet = 'turn';
      dealCommunity(newState, 1);
      break;
    case 'turn':
      newState.currentStreet = 'river';
      dealCommunity(newState, 1);
      break;
    case 'river':
    case 'showdown':
      newState.currentStreet = 'showdown';
      return determineWinner(newState);
  }

  // アクション可能なプレイヤーが1人以下ならベッティング不要 → ランアウト
  if (getPlayersWhoCanAct(newState).length <= 1) {
    return runOutBoard(newState);
  }

  // ディーラーの次から時計回りで最初のアクション可能なプレイヤー
  newState.currentPlayerIndex = getNextActivePlayer(newState, newState.dealerPosition);
  return newState;
}

function dealCommunity(state: GameState, count: number): void {
  const { cards, remainingDeck } = dealCards(state.deck, count);
  state.communityCards.push(...cards);
  state.deck = remainingDeck;
}

/**
 * 残りのコミュニティカードを全て配ってショーダウンへ（全員オールイン時）
 */
function runOutBoard(state: GameState): GameState {
  const newState = structuredClone(state);
  const missing = 5 - newState.communityCards.length;
  if (missing > 0) {
    dealCommunity(newState, missing);
  }
  newState.currentStreet = 'showdown';
  return determineWinner(newState);
}

/**
 * 各プレイヤーの総投入額からポット層を作る。
 * 残っている投入額の最小値 × 投入者数 を1層とし、投入額が尽きるまで繰り返す。
 * 層の獲得資格はその層に投入していてフォールドしていないプレイヤー（小さい層から順）
 */
export function calculateSidePots(players: Player[]): SidePot[] {
  const remaining = players
    .filter(p => p.totalContribution > 0)
    .map(p => ({ id: p.id, amount: p.totalContribution, active: p.active }));

  const pots: SidePot[] = [];
  while (remaining.length > 0) {
    const level = Math.min(...remaining.map(r => r.amount));
    pots.push({
      amount: level * remaining.length,
      eligiblePlayers: remaining.filter(r => r.active).map(r => r.id),
    });

    for (const r of remaining) r.amount -= level;
    for (let i = remaining.length - 1; i >= 0; i--) {
      if (remaining[i].amount === 0) remaining.splice(i, 1);
    }
  }

  return pots;
}

/**
 * 勝者を決定し、ポットを分配する
 */
export function determineWinner(state: GameState): GameState {
  const newState = structuredClone(state);
  newState.isHandComplete = true;
  newState.currentStreet = 'showdown';
  newState.currentPlayerIndex = -1;

  const activePlayers = getActivePlayers(newState);

  // アクティブプレイヤーがいない場合（異常ケース）
  if (activePlayers.length === 0) {
    console.error('[GameEngine] determineWinner: no active players, pot left unclaimed');
    newState.unclaimedChips += newState.pot;
    newState.pot = 0;
    newState.winners = [];
    return newState;
  }

  // 1人だけ残っている場合 → 全ポットを獲得
  if (activePlayers.length === 1) {
    const winner = activePlayers[0];
    const amount = newState.pot;
    winner.chips += amount;
    newState.pot = 0;
    newState.sidePots = [];
    newState.winners = [{ playerId: winner.id, amount, handName: '' }];
    return newState;
  }

  if (newState.communityCards.length !== 5) {
    throw new Error(`determineWinner: showdown requires 5 community cards, got ${newState.communityCards.length}`);
  }

  const hands = new Map(
    activePlayers.map(p => [p.id, evaluateHand([...p.holeCards, ...newState.communityCards])])
  );

  const pots = calculateSidePots(newState.players);
  newState.sidePots = pots;

  const winnerAmounts = new Map<number, Winner>();
  const count = newState.players.length;
  // 端数はディーラーの左から時計回りの順に1枚ずつ
  const seatOrder = (id: number) => (id - newState.dealerPosition - 1 + count) % count;

  for (const pot of pots) {
    const eligible = pot.eligiblePlayers.flatMap(id => {
      const hand = hands.get(id);
      return hand ? [{ playerId: id, hand }] : [];
    });

    if (eligible.length === 0) {
      console.warn(`[GameEngine] pot layer of ${pot.amount} has no eligible player, leaving it unclaimed`);
      newState.unclaimedChips += pot.amount;
      newState.pot -= pot.amount;
      continue;
    }

    eligible.sort((a, b) => compareHands(b.hand, a.hand));
    const potWinners = eligible
      .filter(e => compareHands(e.hand, eligible[0].hand) === 0)
      .sort((a, b) => seatOrder(a.playerId) - seatOrder(b.playerId));

    const share = Math.floor(pot.amount / potWinners.length);
    const remainder = pot.amount % potWinners.length;

    potWinners.forEach((w, i) => {
      const amount = share + (i < remainder ? 1 : 0);
      newState.players[w.playerId].chips += amount;
      newState.pot -= amount;
      const existing = winnerAmounts.get(w.playerId);
      if (existing) {
        existing.amount += amount;
      } else {
        winnerAmounts.set(w.playerId, { playerId: w.playerId, amount, handName: w.hand.name });
      }
    });
  }

  newState.winners = Array.from(winnerAmounts.values());
  return newState;
}

/**
 * 手番に関係なくプレイヤーをフォールドさせる（ハンド中の離席）
 * 手番のプレイヤーなら通常のフォールドと同じく進行させる
 */
export function forceFold(state: GameState, playerIndex: number): GameState {
  const player = state.players[playerIndex];
  if (state.isHandComplete || !player || !player.active) {
    return state;
  }

  if (state.currentPlayerIndex === playerIndex) {
    return applyAction(state, playerIndex, { type: 'fold' });
  }

  const newState = structuredClone(state);
  newState.players[playerIndex].active = false;
  newState.handHistory.push({ playerId: playerIndex, action: 'fold', amount: 0, street: state.currentStreet });

  if (getActivePlayers(newState).length <= 1) {
    return determineWinner(newState);
  }
  // 残った手番のプレイヤーが既に額を揃えていれば、ベットする相手がいない
  if (nothingLeftToBet(newState)) {
    return moveToNextStreet(newState);
  }
  return newState;
}

/**
 * ハンドを中断し、各プレイヤーの投入額を返却する
 */
export function abortHand(state: GameState): GameState {
  const newState = structuredClone(state);
  for (const p of newState.players) {
    p.chips += p.totalContribution;
    p.totalContribution = 0;
    p.currentBet = 0;
  }
  newState.pot = 0;
  newState.sidePots = [];
  newState.currentBet = 0;
  newState.currentPlayerIndex = -1;
  newState.isHandComplete = true;
  newState.winners = [];
  return newState;
}
