import { AmqpService, TaskMessage } from './services/amqp';
import { config } from './config';
import { KeystoneSession } from './services/keystone-session';
import { OpenStackApi, createHttpClient } from './services/openstack-api';
import { InventoryController } from './controllers/inventory.controller';
import { TasksController } from './controllers/tasks.controller';
import logger from './lib/logger';
import fs from 'fs';
import os from 'os';
import path from 'path';

const http = createHttpClient(config.openstack);
const session = new KeystoneSession(config.openstack, http);
const openstack = new OpenStackApi(session, http);

const amqp = new AmqpService(config.broker);
const inventoryController = new InventoryController(openstack, config.inventory);
const tasksController = new TasksController(inventoryController, config.broker.service.agentId);

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    logger.warn('could not read package version', { err });
  }
  return 'unknown';
}

async function start(): Promise<void> {
  const version = readVersion();
  await amqp.init();

  await amqp.consumeTasks(async (task: TaskMessage) => {
    logger.info('task received', { taskId: task.taskId, action: task.action });
    return tasksController.handle(task);
  });

  const heartbeatPayload = () => ({
    agentId: config.broker.service.agentId,
    version,
    capabilities: ['inventory'],
    host: os.hostname(),
    ts: new Date().toISOString(),
  });

  amqp.publishHeartbeat(heartbeatPayload());

  const heartbeatTimer = setInterval(() => {
    try {
      amqp.publishHeartbeat(heartbeatPayload());
    } catch (err) {
      logger.error('Failed to publish heartbeat', { err });
    }
  }, config.heartbeatIntervalMs);

  const shutdown = async () => {
    logger.info('shutting down');
    clearInterval(heartbeatTimer);
    await amqp.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error('shutdown failed', { err });
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

start().catch((err) => {
  logger.error('startup failed', { err });
  process.exit(1);
});
