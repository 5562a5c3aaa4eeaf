import { serve } from "@hono/node-server";
import { Hono } from "hono";
import type { Logger } from "../logging/logger.js";
import type { QueryErrorKind, Result } from "../utils/errors.js";
import type { QueryService } from "./service.js";

const STATUS: Record<QueryErrorKind, 400 | 404 | 503> = {
  invalid: 400,
  not_found: 404,
  transient: 503,
};

export interface HealthStatus {
  readonly status: "ok" | "degraded";
  readonly [key: string]: unknown;
}

export type HealthProbe = () => HealthStatus;

function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json; charset=UTF-8" },
  });
}

function respond<T>(result: Result<T>): Response {
  return result.ok
    ? jsonResponse({ data: result.data }, 200)
    : jsonResponse({ error: result.error }, STATUS[result.error.kind]);
}

export function createQueryApp(service: QueryService, health: HealthProbe): Hono {
  const app = new Hono();
  const startedAt = Date.now();

  app.get("/health", () => {
    const probe = health();
    return jsonResponse({ ...probe, uptime: Date.now() - startedAt }, probe.status === "ok" ? 200 : 503);
  });

  app.get("/items", (c) => respond(service.listItems(c.req.query())));
  app.get("/items/:id", (c) => respond(service.getItem(c.req.param("id"))));
  app.get("/threads", (c) => respond(service.listThreads(c.req.query())));
  app.get("/threads/:id", (c) => respond(service.getThread(c.req.param("id"))));
  app.get("/decisions", (c) => respond(service.listDecisions(c.req.query())));
  app.get("/commitments", (c) => respond(service.listCommitments(c.req.query())));
  app.get("/search", async (c) => respond(await service.search(c.req.query())));

  app.notFound((c) => jsonResponse({ error: { kind: "not_found", message: `No route for ${c.req.path}` } }, 404));
  return app;
}

/** Serves the read-only query API on localhost. */
export class QueryServer {
  private readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;

  constructor(
    service: QueryService,
    health: HealthProbe,
    private readonly port: number,
    private readonly hostname: string,
    private readonly logger: Logger,
  ) {
    this.app = createQueryApp(service, health);
  }

  start(): void {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
    this.logger.info({ port: this.port, hostname: this.hostname }, "Query server listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
