import { describe, it, expect } from 'vitest';
import { parseEnv, toTableConfig } from '../env.js';

describe('parseEnv', () => {
  it('未設定ならデフォルト値', () => {
    const result = parseEnv({});
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.data).toEqual({
      PORT: 3001,
      NODE_ENV: 'development',
      CLIENT_URL: 'http://localhost:5173',
      MIN_PLAYERS: 2,
      MAX_PLAYERS: 9,
      SMALL_BLIND: 10,
      BIG_BLIND: 20,
      STARTING_CHIPS: 1000,
      START_DELAY_MS: 3000,
    });
  });

  it('文字列の数値を変換してテーブル設定にする', () => {
    const result = parseEnv({ MIN_PLAYERS: '3', MAX_PLAYERS: '6', SMALL_BLIND: '5', BIG_BLIND: '10', START_DELAY_MS: '0' });
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(toTableConfig(result.data)).toEqual({
      minPlayers: 3,
      maxPlayers: 6,
      smallBlind: 5,
      bigBlind: 10,
      startingChips: 1000,
      startDelayMs: 0,
    });
  });

  it('デッキに収まらない最大人数はエラー', () => {
    expect(parseEnv({ MAX_PLAYERS: '24' }).success).toBe(false);
    expect(parseEnv({ MAX_PLAYERS: '23' }).success).toBe(true);
  });

  it('最小人数が最大人数を超えるとエラー', () => {
    const result = parseEnv({ MIN_PLAYERS: '5', MAX_PLAYERS: '4' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('MIN_PLAYERS must not exceed MAX_PLAYERS');
  });

  it('SB が BB を超えるとエラー', () => {
    const result = parseEnv({ SMALL_BLIND: '50', BIG_BLIND: '20' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('SMALL_BLIND must not exceed BIG_BLIND');
  });

  it('未知の NODE_ENV はエラー', () => {
    expect(parseEnv({ NODE_ENV: 'staging' }).success).toBe(false);
  });
});
