// Composition root: config → transport → gateway → pools → agent → HTTP listener

import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import type { ChatTransport, Lifecycle, LifecycleStatus, Logger, ToolplanConfig } from "@toolplan/core";
import { Agent, ConsoleLogger, LlmGateway, ProcessPool, ThreadPool } from "@toolplan/core";
import { OpenAICompatibleTransport } from "@toolplan/provider-openai-compat";
import { createApp } from "./app";

export interface ServerOptions {
  readonly logger?: Logger;
  /** Replaces the OpenAI-compatible transport built from config. */
  readonly transport?: ChatTransport;
}

export class ToolplanServer implements Lifecycle {
  readonly app: Hono;
  private server: Server | null = null;
  private _lifecycle: LifecycleStatus = "stopped";

  constructor(
    readonly agent: Agent,
    private readonly config: ToolplanConfig,
    private readonly logger: Logger,
  ) {
    this.app = createApp(agent, { prefix: config.prefix, logger });
  }

  get lifecycle(): LifecycleStatus {
    return this._lifecycle;
  }

  async start(): Promise<void> {
    if (this._lifecycle === "running" || this._lifecycle === "starting") return;
    this._lifecycle = "starting";

    try {
      await this.agent.start();
      this.server = await this.listen();
    } catch (error) {
      this._lifecycle = "stopped";
      await this.agent.stop();
      throw error;
    }

    this._lifecycle = "running";
    this.logger.info("Server started", {
      port: this.config.port,
      prefix: this.config.prefix,
      tools: this.agent.tools.size,
    });
  }

  async stop(): Promise<void> {
    if (this._lifecycle === "stopped" || this._lifecycle === "stopping") return;
    this._lifecycle = "stopping";

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await this.agent.stop();

    this._lifecycle = "stopped";
    this.logger.info("Server stopped");
  }

  /** Resolves once the port is bound; rejects with the listen error (e.g. EADDRINUSE). */
  private listen(): Promise<Server> {
    return new Promise<Server>((resolve, reject) => {
      const server: Server = serve({ fetch: this.app.fetch, port: this.config.port }, () => {
        server.off("error", reject);
        resolve(server);
      });
      server.once("error", reject);
    });
  }
}

/**
 * Build everything the server needs from config. Tools are registered on
 * `server.agent` before `start()`.
 */
export function createServer(config: ToolplanConfig, options: ServerOptions = {}): ToolplanServer {
  const logger = options.logger ?? new ConsoleLogger(config.logLevel);

  const transport =
    options.transport ?? new OpenAICompatibleTransport({ baseUrl: config.llm.baseUrl, apiKey: config.llm.apiKey });

  const gateway = new LlmGateway({
    transport,
    logger,
    maxAttempts: config.llm.maxAttempts,
    models: config.llm.models,
  });

  const pools = [
    new ThreadPool({ size: config.pools.threadWorkers, logger }),
    new ProcessPool({ size: config.pools.processWorkers, logger }),
  ];

  const agent = new Agent({
    gateway,
    logger,
    prefix: config.prefix,
    pools,
    planner: {
      model: config.llm.models.plan,
      maxTokens: config.planner.maxTokens,
      exclusivity: config.planner.exclusivity,
      scoreGap: config.planner.scoreGap,
    },
  });

  return new ToolplanServer(agent, config, logger);
}
