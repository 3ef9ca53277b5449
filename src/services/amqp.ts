import { connect, Channel, ConsumeMessage } from "amqplib";
import { z } from "zod";
import type { Config } from "../config";
import { errorMessage } from "../lib/errors";
import rootLogger from "../lib/logger";

const logger = rootLogger.child("amqp");

type BrokerConnection = Awaited<ReturnType<typeof connect>>;

export type BrokerOptions = Config["broker"];

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const taskMessageSchema = z.object({
  taskId: z.string().min(1),
  action: z.string().min(1),
  data: z.record(z.unknown()).optional().default({}),
});

export type TaskMessage = z.infer<typeof taskMessageSchema>;

export type TaskResult = {
  taskId: string;
  agentId: string;
  ok: boolean;
  result?: unknown;
  error?: string;
  code?: string;
  finishedAt: string;
};

export type Heartbeat = {
  agentId: string;
  version: string;
  capabilities: string[];
  host: string;
  ts: string;
};

export type TaskHandler = (task: TaskMessage) => Promise<TaskResult>;

/** Parse a delivery body into a task; null when it is not one. */
export function parseTaskMessage(body: Buffer | string): TaskMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(body.toString());
  } catch (err) {
    logger.warn("task payload is not JSON", { err });
    return null;
  }
  const parsed = taskMessageSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn("task payload rejected", { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) });
    return null;
  }
  return parsed.data;
}

export class AmqpService {
  private conn?: BrokerConnection;
  private ch?: Channel;
  private consumer?: TaskHandler;
  private connectPromise?: Promise<void>;
  private reconnectTimer?: NodeJS.Timeout;
  private shuttingDown = false;

  constructor(private readonly options: BrokerOptions) {}

  private get queue(): string {
    return this.options.task.queue || `agent.${this.options.service.agentId}.tasks`;
  }

  async init(): Promise<void> {
    await this.ensureConnected();
  }

  async consumeTasks(onTask: TaskHandler): Promise<void> {
    this.consumer = onTask;
    if (!this.ch) {
      await this.ensureConnected();
    }
    await this.startConsumer(onTask);
  }

  publishResult(action: string, result: TaskResult): void {
    const ch = this.getChannel();
    if (!ch) {
      logger.warn("dropping result publish, channel unavailable", { action, taskId: result.taskId });
      return;
    }
    logger.debug("publishing result", { action, taskId: result.taskId, ok: result.ok });
    ch.publish(this.options.results.exchange, `task.${action}`, Buffer.from(JSON.stringify(result)), {
      contentType: "application/json",
      deliveryMode: 2,
      correlationId: result.taskId,
    });
  }

  publishHeartbeat(payload: Heartbeat): void {
    const ch = this.getChannel();
    if (!ch) {
      logger.warn("dropping heartbeat, channel unavailable", { agentId: payload.agentId });
      return;
    }
    const routingKey = `heartbeat.${payload.agentId}`;
    logger.debug("publishing heartbeat", { routingKey, payload });
    ch.publish(this.options.telemetry.exchange, routingKey, Buffer.from(JSON.stringify(payload)), {
      contentType: "application/json",
      deliveryMode: 2,
    });
  }

  async close(): Promise<void> {
    this.shuttingDown = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    await this.ch?.close();
    await this.conn?.close();
  }

  private async ensureConnected(): Promise<void> {
    if (!this.connectPromise) {
      this.connectPromise = this.connectWithRetry();
    }
    await this.connectPromise;
  }

  private async connectWithRetry(): Promise<void> {
    const delayMs = this.options.reconnectDelayMs;
    while (!this.shuttingDown) {
      try {
        await this.createConnection();
        return;
      } catch (err) {
        logger.error("failed to connect to AMQP, retrying", { err, delayMs });
        await wait(delayMs);
      }
    }
  }

  private async createConnection(): Promise<void> {
    logger.info("connecting to AMQP", { host: new URL(this.options.url).host });
    const conn = await connect(this.options.url);
    this.conn = conn;
    conn.on("error", (err) => {
      if (this.shuttingDown) return;
      logger.error("AMQP connection error", { err });
    });
    conn.on("close", () => {
      if (this.shuttingDown) return;
      logger.warn("AMQP connection closed, scheduling reconnect", { delayMs: this.options.reconnectDelayMs });
      this.cleanupConnection();
      this.connectPromise = undefined;
      this.scheduleReconnect();
    });

    const ch = await conn.createChannel();
    this.ch = ch;

    await this.setupTopology(ch);

    if (this.consumer) {
      await this.startConsumer(this.consumer);
    }

    logger.info("AMQP ready", {
      exchanges: {
        jobs: this.options.task.exchange,
        telemetry: this.options.telemetry.exchange,
        results: this.options.results.exchange,
      },
      queue: this.queue,
      prefetch: this.options.prefetchCount,
    });
  }

  private async setupTopology(ch: Channel): Promise<void> {
    await ch.prefetch(this.options.prefetchCount);
    await ch.assertExchange(this.options.task.exchange, "direct", { durable: true });
    await ch.assertExchange(this.options.telemetry.exchange, "topic", { durable: true });
    await ch.assertExchange(this.options.results.exchange, "topic", { durable: true });
  }

  private async startConsumer(onTask: TaskHandler): Promise<void> {
    const ch = this.getChannel();
    if (!ch) {
      throw new Error("Channel not initialized");
    }
    await ch.assertQueue(this.queue, { durable: true });
    await ch.bindQueue(this.queue, this.options.task.exchange, this.options.service.agentId);

    await ch.consume(this.queue, (msg: ConsumeMessage | null) => {
      if (!msg) return;
      void this.deliver(ch, msg, onTask);
    });
  }

  private async deliver(ch: Channel, msg: ConsumeMessage, onTask: TaskHandler): Promise<void> {
    const task = parseTaskMessage(msg.content);
    if (!task) {
      ch.nack(msg, false, false);
      return;
    }

    let result: TaskResult;
    try {
      result = await onTask(task);
    } catch (error) {
      logger.error("task handler threw", { taskId: task.taskId, action: task.action, err: error });
      result = {
        taskId: task.taskId,
        agentId: this.options.service.agentId,
        ok: false,
        error: errorMessage(error),
        finishedAt: new Date().toISOString(),
      };
    }
    try {
      this.publishResult(task.action, result);
      ch.ack(msg);
    } catch (err) {
      logger.error("failed to publish task result", { taskId: task.taskId, err });
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.shuttingDown) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.ensureConnected().catch((err) => logger.error("reconnect failed", { err }));
    }, this.options.reconnectDelayMs);
  }

  private cleanupConnection(): void {
    this.ch = undefined;
    this.conn = undefined;
  }

  private getChannel(): Channel | undefined {
    if (this.ch) return this.ch;
    this.scheduleReconnect();
    return undefined;
  }
}
