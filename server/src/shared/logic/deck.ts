import { Card, Rank, Suit } from './types.js';
import { EmptyDeckError } from './errors.js';

export const SUITS: readonly Suit[] = ['h', 'd', 'c', 's'];
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A'];

const SUIT_SYMBOLS: Record<Suit, string> = { h: '♥', d: '♦', c: '♣', s: '♠' };

/** 52枚のデッキを作成（未シャッフル） */
export function createDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push({ rank, suit });
    }
  }
  return deck;
}

/**
 * Fisher-Yates シャッフル。元の配列は変更しない
 */
export function shuffleDeck(deck: Card[], random: () => number = Math.random): Card[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * デッキの先頭から count 枚を引く。
 * 足りない場合は1枚も引かずに EmptyDeckError を投げる
 */
export function dealCards(deck: Card[], count: number): { cards: Card[]; remainingDeck: Card[] } {
  if (count > deck.length) {
    throw new EmptyDeckError(count, deck.length);
  }
  return {
    cards: deck.slice(0, count),
    remainingDeck: deck.slice(count),
  };
}

// 2-14（A=14）
export function getRankValue(rank: Rank): number {
  return RANKS.indexOf(rank) + 2;
}

export function formatCard(card: Card): string {
  const rank = card.rank === 'T' ? '10' : card.rank;
  return `${rank}${SUIT_SYMBOLS[card.suit]}`;
}
