// Agent: facade over one ToolRegistry and one PlanGenerator
//
// Flow: register() tools at load time → start() materializes their schemas →
//   generatePlan() over whatever is published → stop() drains the pools.

import type { RegisterOptions, RegisteredTool } from "./types/tool";
import type { DynamicPlanTracer } from "./types/plan";
import type { WorkerPool } from "./types/pool";
import type { Lifecycle, LifecycleStatus } from "./types/lifecycle";
import type { Logger } from "./types/logger";
import { silentLogger } from "./types/logger";
import { ToolRegistry, type ToolDescriber } from "./tool-registry";
import { PlanGenerator, type PlanGeneratorOptions, type PlanRequester } from "./plan-generator";

export interface AgentDeps {
  readonly gateway: ToolDescriber & PlanRequester;
  readonly logger?: Logger;
  /** Entry-point prefix for registered tools. */
  readonly prefix?: string;
  /** Attached to the registry; shut down by stop(). */
  readonly pools?: readonly WorkerPool[];
  readonly planner?: Omit<PlanGeneratorOptions, "gateway" | "logger">;
}

export interface AgentStatus {
  readonly status: LifecycleStatus;
}

export class Agent implements Lifecycle {
  readonly registry: ToolRegistry;
  readonly planner: PlanGenerator;
  private readonly logger: Logger;
  private readonly pools: readonly WorkerPool[];
  private _lifecycle: LifecycleStatus = "stopped";

  constructor(deps: AgentDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.pools = deps.pools ?? [];
    this.registry = new ToolRegistry({
      gateway: deps.gateway,
      logger: this.logger,
      prefix: deps.prefix,
      pools: this.pools,
    });
    this.planner = new PlanGenerator({ ...deps.planner, gateway: deps.gateway, logger: this.logger });
  }

  get lifecycle(): LifecycleStatus {
    return this._lifecycle;
  }

  get tools(): ReadonlyMap<string, RegisteredTool> {
    return this.registry.tools;
  }

  register<A extends unknown[], R>(
    fn: (...args: A) => R,
    options?: RegisterOptions,
  ): (...args: A) => Promise<Awaited<R>> {
    return this.registry.register(fn, options);
  }

  async start(): Promise<void> {
    if (this._lifecycle === "running" || this._lifecycle === "starting") return;
    this._lifecycle = "starting";
    this.logger.info("Starting up agent", { pending: this.registry.pendingCount });

    try {
      await this.registry.materialize();
    } catch (error) {
      this._lifecycle = "stopped";
      throw error;
    }

    this._lifecycle = "running";
    this.logger.info("Agent is ready", { tools: this.registry.size });
  }

  /**
   * Drain and shut down the injected pools. Runs even when the agent never
   * started: wrappers are usable as soon as register() returns, so workers may
   * exist already. Pool shutdown is idempotent.
   */
  async stop(): Promise<void> {
    const wasStopped = this._lifecycle === "stopped";
    this._lifecycle = "stopping";

    await Promise.all(this.pools.map((pool) => pool.shutdown()));

    this._lifecycle = "stopped";
    if (!wasStopped) this.logger.info("Agent stopped");
  }

  generatePlan(query: string): Promise<DynamicPlanTracer[]> {
    return this.planner.generatePlan(query, this.registry.tools);
  }

  status(): AgentStatus {
    return { status: this._lifecycle };
  }
}
