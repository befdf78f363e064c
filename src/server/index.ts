export { createApp } from "./app.js";
export type { AppDependencies, HealthResponse } from "./app.js";
export { HttpServer } from "./http-server.js";
export type { HttpServerOptions } from "./http-server.js";
