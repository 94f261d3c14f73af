import { FastifyInstance } from 'fastify';
import { TableManager } from '../table/TableManager.js';

interface LobbyDependencies {
  tableManager: TableManager;
}

export function lobbyRoutes(deps: LobbyDependencies) {
  const { tableManager } = deps;

  return async function (fastify: FastifyInstance) {
    // 各テーブルの着席・待機人数
    fastify.get('/api/tables', async () => {
      return tableManager.getTablesInfo();
    });
  };
}
