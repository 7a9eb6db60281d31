// HTTP surface: plan generation and agent status as a Hono app

import { Hono } from "hono";
import { createMiddleware } from "hono/factory";
import { z } from "zod";
import type { Agent, Logger } from "@toolplan/core";
import { describeError, silentLogger, toTracerWire } from "@toolplan/core";

/** What the routes need from the agent. */
export type PlanningAgent = Pick<Agent, "generatePlan" | "status">;

export interface AppOptions {
  /** Route prefix, e.g. "/agent/v1". */
  readonly prefix: string;
  readonly logger?: Logger;
}

const GeneratePlanBodySchema = z.object({
  task: z.string({ error: "task must be a string" }).min(1, { error: "task must not be empty" }),
});

export function createApp(agent: PlanningAgent, options: AppOptions): Hono {
  const logger = (options.logger ?? silentLogger).child({ component: "HttpServer" });
  const prefix = options.prefix.replace(/\/+$/, "");
  const app = new Hono();

  app.use(
    "*",
    createMiddleware(async (c, next) => {
      const start = Date.now();
      await next();
      logger.debug("Request handled", {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - start,
      });
    }),
  );

  app.post(`${prefix}/generate_plan`, async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ message: "Request body must be JSON" }, 400);
    }

    const parsed = GeneratePlanBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ message: parsed.error.issues[0]?.message ?? "Invalid request body" }, 400);
    }

    const plans = await agent.generatePlan(parsed.data.task);
    return c.json({ status: 200, plan: plans.map(toTracerWire) });
  });

  app.get(`${prefix}/status`, (c) => c.json(agent.status()));

  app.onError((error, c) => {
    logger.error("Request failed", { method: c.req.method, path: c.req.path, ...describeError(error) });
    return c.json({ message: "Internal server error" }, 500);
  });

  return app;
}
