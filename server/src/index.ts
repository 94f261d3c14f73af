import Fastify from 'fastify';
import cors from '@fastify/cors';
import { Server } from 'socket.io';
import { env, toTableConfig } from './config/env.js';
import { setupGameSocket } from './modules/game/socket.js';
import { lobbyRoutes } from './modules/lobby/routes.js';
import { TableManager } from './modules/table/TableManager.js';

const fastify = Fastify({
  logger: env.NODE_ENV === 'development' ? { level: 'warn' } : false,
  trustProxy: env.NODE_ENV === 'production',
});

// Plugins
await fastify.register(cors, {
  origin: env.CLIENT_URL,
  credentials: true,
});

// Health check
fastify.get('/health', async () => {
  return { status: 'ok', timestamp: new Date().toISOString() };
});

const tableManager = new TableManager(toTableConfig(env));

await fastify.register(lobbyRoutes({ tableManager }));

// Socket.io は Fastify と同じ HTTP サーバーに載せる
const io = new Server(fastify.server, {
  cors: {
    origin: env.CLIENT_URL,
    credentials: true,
  },
  pingInterval: 10000,  // 10秒ごとにping
  pingTimeout: 5000,    // 5秒以内にpongがなければ切断と判断
});

setupGameSocket(io, tableManager);

const start = async () => {
  try {
    await fastify.listen({ port: env.PORT, host: '0.0.0.0' });

    console.log(`✅ Server running on http://localhost:${env.PORT}`);
    console.log(`✅ WebSocket ready on ws://localhost:${env.PORT}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  console.log('Shutting down...');
  for (const info of tableManager.getTablesInfo()) {
    tableManager.removeTable(info.id);
  }
  io.disconnectSockets(true);
  await fastify.close();
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch(err => {
    console.error('Shutdown failed:', err);
    process.exit(1);
  });
};

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);

void start();
