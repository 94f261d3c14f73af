import { describe, it, expect, afterEach, vi } from 'vitest';
import Fastify from 'fastify';
import { TableManager } from '../../table/TableManager.js';
import { lobbyRoutes } from '../routes.js';
import { TEST_CONFIG } from '../../table/__tests__/testHelpers.js';

describe('GET /api/tables', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('テーブル一覧を返す', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const tableManager = new TableManager(TEST_CONFIG);
    tableManager.createTable('friends');

    const fastify = Fastify();
    await fastify.register(lobbyRoutes({ tableManager }));

    const res = await fastify.inject({ method: 'GET', url: '/api/tables' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      {
        id: 'friends',
        name: 'Table friends',
        blinds: '10/20',
        players: 0,
        waiting: 0,
        maxPlayers: 4,
        isHandInProgress: false,
      },
    ]);

    await fastify.close();
    tableManager.removeTable('friends');
  });
});
