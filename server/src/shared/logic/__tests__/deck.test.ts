import { describe, it, expect } from 'vitest';
import { createDeck, shuffleDeck, dealCards, getRankValue, formatCard } from '../deck.js';
import { EmptyDeckError } from '../errors.js';

const key = (card: { rank: string; suit: string }) => `${card.rank}${card.suit}`;

describe('createDeck', () => {
  it('重複のない52枚を作成する', () => {
    const deck = createDeck();
    expect(deck).toHaveLength(52);
    expect(new Set(deck.map(key)).size).toBe(52);
  });
});

describe('shuffleDeck', () => {
  it('同じカードの集合を返し、元の配列は変更しない', () => {
    const deck = createDeck();
    const before = deck.map(key);
    const shuffled = shuffleDeck(deck);

    expect(deck.map(key)).toEqual(before);
    expect([...shuffled.map(key)].sort()).toEqual([...before].sort());
  });

  it('乱数が常に最大値なら順序は変わらない', () => {
    const deck = createDeck();
    const shuffled = shuffleDeck(deck, () => 0.999999);
    expect(shuffled.map(key)).toEqual(deck.map(key));
  });
});

describe('dealCards', () => {
  it('先頭から指定枚数を引き、残りを返す', () => {
    const deck = createDeck();
    const { cards, remainingDeck } = dealCards(deck, 3);

    expect(cards.map(key)).toEqual(['2h', '3h', '4h']);
    expect(remainingDeck).toHaveLength(49);
    expect(remainingDeck[0]).toEqual({ rank: '5', suit: 'h' });
    expect(deck).toHaveLength(52);
  });

  it('残り枚数を超えると1枚も引かずに EmptyDeckError', () => {
    const deck = createDeck().slice(0, 2);

    expect(() => dealCards(deck, 3)).toThrow(EmptyDeckError);
    expect(deck).toHaveLength(2);
  });

  it('残りちょうどの枚数は引ける', () => {
    const { cards, remainingDeck } = dealCards(createDeck().slice(0, 5), 5);
    expect(cards).toHaveLength(5);
    expect(remainingDeck).toHaveLength(0);
  });
});

describe('getRankValue / formatCard', () => {
  it('ランクを2〜14に変換する', () => {
    expect(getRankValue('2')).toBe(2);
    expect(getRankValue('T')).toBe(10);
    expect(getRankValue('A')).toBe(14);
  });

  it('カードを表示用文字列にする', () => {
    expect(formatCard({ rank: 'A', suit: 's' })).toBe('A♠');
    expect(formatCard({ rank: 'T', suit: 'h' })).toBe('10♥');
  });
});
