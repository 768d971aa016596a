import express, { type NextFunction, type Request, type Response } from "express";
import bodyParser from "body-parser";
import { z } from "zod";
import { DAY_ARGUMENT_FORMATS, parseDayArgument } from "../dayArgument.js";
import { SchedulerBusyError } from "../errors.js";
import { logger } from "../logger.js";
import type { DailyScheduler } from "../scheduler.js";
import type { DigestRunner } from "../schedulerHelpers.js";

export type AdminDeps = {
  scheduler: Pick<DailyScheduler, "runNow" | "snapshot">;
  runner: DigestRunner;
  timezone: string;
  adminToken: string;
  now?: () => Date;
};

const HELP =
  `Hi, I'm the channel digest agent. I send one keyword digest a day. ` +
  `POST /admin/summary/run with {"day": "yesterday"} for an on-demand digest, or GET /admin/status.`;

const runRequestSchema = z.object({
  day: z.string().trim().min(1).optional(),
  deliver: z.boolean().optional(),
});

function requireAdmin(token: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) {
      res.status(403).json({ error: "Admin endpoints are disabled; set ADMIN_TOKEN to enable them" });
      return;
    }
    if (req.get("authorization") !== `Bearer ${token}`) {
      logger.warn({ path: req.path, ip: req.ip }, "Unauthorized admin request");
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}

export function createApp(deps: AdminDeps): express.Express {
  const now = deps.now ?? (() => new Date());
  const app = express();
  app.use(bodyParser.json());

  app.get("/", (_req, res) => res.json({ output: HELP }));
  app.get("/ping", (_req, res) => res.json({ output: "pong" }));

  app.use("/admin", requireAdmin(deps.adminToken));

  app.get("/admin/status", (_req, res) => {
    res.json({ scheduler: deps.scheduler.snapshot(), lastRun: deps.runner.lastOutcome()?.diagnostics ?? null });
  });

  app.post("/admin/summary/run", async (req, res) => {
    const parsed = runRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request body", issues: parsed.error.issues.map((i) => i.message) });
    }
    const { day, deliver } = parsed.data;

    let date: string | null = null;
    if (day) {
      date = parseDayArgument(day, deps.timezone, now());
      if (!date) {
        return res.status(400).json({ error: `Could not parse day "${day}"`, validFormats: DAY_ARGUMENT_FORMATS });
      }
    }

    logger.info({ day, date, deliver }, "On-demand summary requested");
    try {
      const outcome = await deps.scheduler.runNow((signal) =>
        date ? deps.runner.runForDay(date, signal, { deliver }) : deps.runner.runRecent(signal, { deliver }),
      );
      return res.json({ output: outcome.report.body, diagnostics: outcome.diagnostics });
    } catch (err) {
      if (err instanceof SchedulerBusyError) {
        return res.status(409).json({ error: err.message });
      }
      logger.error({ err }, "On-demand summary failed");
      return res.status(500).json({ error: "Internal server error" });
    }
  });

  return app;
}
