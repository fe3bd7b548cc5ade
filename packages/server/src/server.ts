import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyStatic from "@fastify/static";
import { basename, dirname } from "node:path";
import { loggerOptions, type RefreshScheduler } from "@timetable-ics/core";
import { registerCalendarRoutes } from "./routes/calendar.js";
import { registerStatusRoutes } from "./routes/status.js";

export interface ServerOptions {
  /** Published calendar file, served under its own file name */
  outputPath: string;
  scheduler: RefreshScheduler;
  /** Defaults to the core logger settings */
  logger?: FastifyServerOptions["logger"];
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    outputPath: string;
    refreshScheduler: RefreshScheduler;
  }
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? loggerOptions(),
  });

  fastify.decorate("outputPath", options.outputPath);
  fastify.decorate("refreshScheduler", options.scheduler);

  // Only the published file itself is reachable; the hidden temp files the
  // publisher writes next to it are denied.
  await fastify.register(fastifyStatic, {
    root: dirname(options.outputPath),
    serve: false,
    dotfiles: "deny",
    cacheControl: false,
  });

  await registerCalendarRoutes(fastify, basename(options.outputPath));
  await registerStatusRoutes(fastify);

  return fastify;
}
