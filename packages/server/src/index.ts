export { createApp, type AppOptions, type PlanningAgent } from "./app";
export { createServer, ToolplanServer, type ServerOptions } from "./server";
