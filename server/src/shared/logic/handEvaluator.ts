import { Card, HandRank, Suit } from './types.js';
import { getRankValue } from './deck.js';

const HAND_NAMES = [
  '',
  'High Card',
  'One Pair',
  'Two Pair',
  'Three of a Kind',
  'Straight',
  'Flush',
  'Full House',
  'Four of a Kind',
  'Straight Flush',
] as const;

const WHEEL = [14, 5, 4, 3, 2];

/**
 * 2〜7枚のカードから役を判定する（ホールカード + コミュニティカード）
 * 入力順には依存しない
 */
export function evaluateHand(cards: Card[]): HandRank {
  if (cards.length < 2 || cards.length > 7) {
    throw new RangeError(`evaluateHand expects 2-7 cards, got ${cards.length}`);
  }
  assertDistinct(cards);

  // ランク・スートのヒストグラム
  const rankCounts = new Map<number, number>();
  const suitValues = new Map<Suit, number[]>();
  for (const card of cards) {
    const value = getRankValue(card.rank);
    rankCounts.set(value, (rankCounts.get(value) ?? 0) + 1);
    const values = suitValues.get(card.suit) ?? [];
    values.push(value);
    suitValues.set(card.suit, values);
  }

  const ranksDesc = Array.from(rankCounts.keys()).sort((a, b) => b - a);
  const groups = getGroups(rankCounts);

  let flushValues: number[] | null = null;
  for (const values of suitValues.values()) {
    if (values.length >= 5) {
      flushValues = [...values].sort((a, b) => b - a);
    }
  }

  const straight = findStraight(ranksDesc);

  // ストレートフラッシュ: フラッシュとストレートが両方成立していれば、構成カードのスートは問わない
  if (flushValues && straight) {
    return makeRank(9, straight);
  }

  // フォーカード
  if (groups[0].count === 4) {
    const quad = groups[0].value;
    return makeRank(8, [quad, ...kickers(ranksDesc, [quad], 1)]);
  }

  // フルハウス（スリーカードが2組ある場合は低い方をペアとして使う）
  if (groups[0].count === 3) {
    const trips = groups[0].value;
    const pairCandidates = groups
      .filter(g => g.value !== trips && g.count >= 2)
      .map(g => g.value)
      .sort((a, b) => b - a);
    if (pairCandidates.length > 0) {
      return makeRank(7, [trips, pairCandidates[0]]);
    }
  }

  // フラッシュ
  if (flushValues) {
    return makeRank(6, flushValues.slice(0, 5));
  }

  // ストレート
  if (straight) {
    return makeRank(5, straight);
  }

  // スリーカード
  if (groups[0].count === 3) {
    const trips = groups[0].value;
    return makeRank(4, [trips, ...kickers(ranksDesc, [trips], 2)]);
  }

  // ツーペア（3組ある場合は上位2組、残りの最高ランクがキッカー）
  if (groups[0].count === 2 && groups.length > 1 && groups[1].count === 2) {
    const [high, low] = [groups[0].value, groups[1].value];
    return makeRank(3, [high, low, ...kickers(ranksDesc, [high, low], 1)]);
  }

  // ワンペア
  if (groups[0].count === 2) {
    const pair = groups[0].value;
    return makeRank(2, [pair, ...kickers(ranksDesc, [pair], 3)]);
  }

  // ハイカード
  return makeRank(1, ranksDesc.slice(0, 5));
}

/**
 * 役の強さを比較する。a が強ければ正、弱ければ負、同じなら0
 */
export function compareHands(a: HandRank, b: HandRank): number {
  if (a.rank !== b.rank) return a.rank - b.rank;

  for (let i = 0; i < Math.min(a.highCards.length, b.highCards.length); i++) {
    if (a.highCards[i] !== b.highCards[i]) {
      return a.highCards[i] - b.highCards[i];
    }
  }

  return 0;
}

function makeRank(rank: number, highCards: number[]): HandRank {
  return { rank, name: HAND_NAMES[rank], highCards };
}

/**
 * 降順のユニークなランク列から最も高いストレートを探す。
 * A-2-3-4-5（ホイール）は [5, 4, 3, 2, 1] として返す
 */
function findStraight(valuesDesc: number[]): number[] | null {
  const unique = Array.from(new Set(valuesDesc));
  for (let i = 0; i + 4 < unique.length; i++) {
    if (unique[i] - unique[i + 4] === 4) {
      return unique.slice(i, i + 5);
    }
  }

  if (WHEEL.every(v => unique.includes(v))) {
    return [5, 4, 3, 2, 1];
  }

  return null;
}

// 役を構成するランクを除いた上位ランク
function kickers(ranksDesc: number[], exclude: number[], count: number): number[] {
  return ranksDesc.filter(v => !exclude.includes(v)).slice(0, count);
}

function getGroups(rankCounts: Map<number, number>): { value: number; count: number }[] {
  const groups = Array.from(rankCounts.entries()).map(([value, count]) => ({ value, count }));
  groups.sort((a, b) => {
    if (b.count !== a.count) return b.count - a.count;
    return b.value - a.value;
  });
  return groups;
}

function assertDistinct(cards: Card[]): void {
  const seen = new Set<string>();
  for (const card of cards) {
    const key = `${card.rank}${card.suit}`;
    if (seen.has(key)) {
      throw new RangeError(`Duplicate card ${key}`);
    }
    seen.add(key);
  }
}
