/**
 * Task Routes
 *
 * HTTP surface of the scheduler. Any endpoint takes `?pretty` for indented
 * JSON. Boolean flags count as set when present, unless given as
 * "false" or "0".
 */

import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { createComponentLogger } from "#logging.js";
import {
  LookupFailedError,
  StorageWriteError,
  TaskNotFoundError,
  TaskValidationError,
  formatTaskId,
  parseCreateRequest,
  parseTaskKey,
  parseTaskRef,
  toTaskView,
  type SchedulingService,
} from "../services/scheduler/index.js";

const log = createComponentLogger("http");

type ApiStatus = 200 | 400 | 404 | 500;

export function isFlagSet(value: string | undefined): boolean {
  return value !== undefined && value !== "false" && value !== "0";
}

function respond(c: Context, data: object, status: ApiStatus = 200): Response {
  if (isFlagSet(c.req.query("pretty"))) {
    return c.body(JSON.stringify(data, null, 2), status, { "Content-Type": "application/json" });
  }
  return c.json(data, status);
}

function statusForError(error: unknown): ApiStatus {
  if (error instanceof TaskValidationError) return 400;
  if (error instanceof TaskNotFoundError) return 404;
  return 500;
}

// ============================================
// ROUTES
// ============================================

export function registerTaskRoutes(app: Hono, service: SchedulingService): void {
  // Create a task
  app.put("/task", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new TaskValidationError("MalformedRequest", "request body must be valid JSON");
    }
    const taskId = await service.create(parseCreateRequest(body));
    return respond(c, { task_id: taskId });
  });

  // Copy failed (or, with ?all, every) occurrences to a new trigger time
  app.post("/reschedule/:ref", async (c) => {
    const ref = parseTaskRef(c.req.param("ref"));
    const triggerAt = c.req.query("trigger_at") || undefined;
    const tasks = await service.reschedule(ref, triggerAt, isFlagSet(c.req.query("all")));
    return respond(c, tasks.map(toTaskView));
  });

  // List or look up tasks
  const status = async (c: Context, rawRef: string): Promise<Response> => {
    const ref = parseTaskRef(rawRef);
    const startFrom = c.req.query("start_from");
    const cursor = startFrom ? parseTaskKey(startFrom) : undefined;
    const result = await service.status(ref, cursor, isFlagSet(c.req.query("future_only")));
    return respond(c, {
      tasks: result.tasks.map(toTaskView),
      next: result.next ? formatTaskId(result.next) : null,
    });
  };
  app.get("/status", (c) => status(c, ""));
  app.get("/status/", (c) => status(c, ""));
  app.get("/status/:ref", (c) => status(c, c.req.param("ref")));

  app.get("/stats", async (c) => respond(c, await service.stats()));
}

/** Build the HTTP app around a scheduling service. */
export function createApp(service: SchedulingService): Hono {
  const app = new Hono();
  app.use("*", cors());

  registerTaskRoutes(app, service);

  app.notFound((c) => respond(c, { error: "not found" }, 404));

  app.onError((error, c) => {
    const status = statusForError(error);
    if (status === 500 && !(error instanceof LookupFailedError || error instanceof StorageWriteError)) {
      log.error("Unhandled request error", error, { path: c.req.path });
      return respond(c, { error: "internal server error" }, 500);
    }
    return respond(c, { error: error.message }, status);
  });

  return app;
}
