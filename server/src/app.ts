import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import archiver from "archiver";
import { z } from "zod";
import type { PipelineMode, TriagePolicyStore } from "./config.js";
import { TriagePolicyUpdateSchema } from "./config.js";
import type { SessionExecutor } from "./executor.js";
import type { SessionManager } from "./session_manager.js";
import { AuditWriteFailure } from "./pipeline/errors.js";
import { EvidenceTrace, evidenceTag } from "./pipeline/evidence_trace.js";
import type { ResourceLeaseGovernor } from "./pipeline/lease_governor.js";
import type { OverrideAuditLog } from "./pipeline/override_log.js";
import type { RemoteReviewSync } from "./pipeline/remote_sync.js";
import { MODALITIES, OVERRIDABLE_FIELDS } from "./pipeline/types.js";
import { errorMessage, isSafeSessionId, sessionDirAbs } from "./pipeline/utils.js";

const ModalityPayloadSchema = z
  .object({
    ref: z.string().trim().min(1).max(2048),
    metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional()
  })
  .strict();

const SessionInputsSchema = z
  .object({
    audio: ModalityPayloadSchema.optional(),
    cxr: ModalityPayloadSchema.optional(),
    histopathology: ModalityPayloadSchema.optional(),
    derm: ModalityPayloadSchema.optional(),
    entities: z.record(z.unknown()).optional(),
    skip: z.array(z.enum(MODALITIES)).optional()
  })
  .strict();

const CreateSessionBodySchema = z
  .object({
    patient_id: z.string().trim().min(1).max(128),
    inputs: SessionInputsSchema.optional(),
    autoStart: z.boolean().optional()
  })
  .strict();

const OverrideBodySchema = z
  .object({
    clinician_id: z.string().trim().min(1).max(128),
    field: z.enum(OVERRIDABLE_FIELDS),
    new_value: z.string().trim().min(1).max(20_000),
    reason: z.string().trim().min(1).max(2_000)
  })
  .strict();

const OverrideFieldQuerySchema = z.enum(OVERRIDABLE_FIELDS).optional();

export type AppDeps = {
  sessions: SessionManager;
  executor: SessionExecutor;
  governor: ResourceLeaseGovernor;
  overrides: OverrideAuditLog;
  policy: TriagePolicyStore;
  sync?: RemoteReviewSync | null;
  mode?: PipelineMode;
};

function route(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function httpStatusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function createApp(deps: AppDeps) {
  const { sessions, executor, governor, overrides, policy } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  function policyEnvelope() {
    return { policy: policy.current(), path: "triage_policy.json" };
  }

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      mode: deps.mode ?? "fake",
      hasKey: Boolean(process.env.OPENAI_API_KEY && process.env.OPENAI_API_KEY.trim().length > 0),
      sessions: sessions.listSessions().length,
      governor: {
        budget_mb: governor.budgetMb,
        mode: governor.mode,
        allocated_mb: governor.inUseMb(),
        peak_mb: governor.peak()
      },
      sync: deps.sync ? deps.sync.stats() : { enabled: false, pending: 0, delivered: 0, failed: 0, attempts: 0 }
    });
  });

  app.get("/api/governor", (_req, res) => {
    res.json(governor.snapshot());
  });

  app.get("/api/policy", (_req, res) => {
    res.json(policyEnvelope());
  });

  app.put(
    "/api/policy",
    route(async (req, res) => {
      const parsed = TriagePolicyUpdateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.flatten() });
        return;
      }
      await policy.update(parsed.data);
      res.json(policyEnvelope());
    })
  );

  app.post(
    "/api/sessions",
    route(async (req, res) => {
      const parsed = CreateSessionBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.flatten() });
        return;
      }

      const session = await sessions.createSession(parsed.data.patient_id, parsed.data.inputs ?? {});
      res.status(201).json({ session_id: session.session_id });

      if (parsed.data.autoStart ?? true) executor.enqueue(session.session_id);
    })
  );

  app.get("/api/sessions", (_req, res) => {
    res.json(sessions.listSessions());
  });

  app.get("/api/sessions/:sessionId", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    res.json({
      ...session,
      running: executor.isRunning(session.session_id),
      queued: executor.isQueued(session.session_id),
      has_case: sessions.caseStore.getCase(session.session_id) !== null
    });
  });

  app.post("/api/sessions/:sessionId/cancel", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }

    const ok = executor.cancel(session.session_id);
    if (!ok) {
      res.status(409).json({ error: "session not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.post("/api/sessions/:sessionId/resume", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    if (executor.isRunning(session.session_id)) {
      res.status(409).json({ error: "session is currently running" });
      return;
    }

    const ok = executor.enqueue(session.session_id);
    if (!ok) {
      res.status(409).json({ error: `a ${session.status} session cannot be resumed` });
      return;
    }
    res.json({ ok: true });
  });

  app.get("/api/sessions/:sessionId/evidence", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    res.json(sessions.listEvidence(session.session_id).map((e) => ({ ...e, tag: evidenceTag(e.id) })));
  });

  app.get("/api/sessions/:sessionId/debate", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    const evidence = sessions.listEvidence(session.session_id);
    const trace = new EvidenceTrace(session.session_id, evidence);
    res.json(
      sessions.listDebateOutputs(session.session_id).map((d) => ({ ...d, citations: trace.validate(d.output_text).tags }))
    );
  });

  app.get("/api/sessions/:sessionId/case", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    const oncoCase = sessions.caseStore.getCase(session.session_id);
    if (!oncoCase) {
      res.status(404).json({ error: "case not finalized" });
      return;
    }
    res.json(oncoCase);
  });

  app.post(
    "/api/sessions/:sessionId/overrides",
    route(async (req, res) => {
      const session = sessions.getSession(req.params.sessionId);
      if (!session) {
        res.status(404).json({ error: "session not found" });
        return;
      }
      const parsed = OverrideBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.flatten() });
        return;
      }

      try {
        const { clinician_id, field, new_value, reason } = parsed.data;
        const row = await overrides.record(session.session_id, clinician_id, field, new_value, reason);
        res.status(201).json(row);
      } catch (err) {
        if (err instanceof AuditWriteFailure) {
          res.status(503).json({ error: err.message, recoverable: err.recoverable });
          return;
        }
        throw err;
      }
    })
  );

  app.get("/api/sessions/:sessionId/overrides", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    const field = OverrideFieldQuerySchema.safeParse(req.query.field);
    if (!field.success) {
      res.status(400).json({ error: field.error.flatten() });
      return;
    }
    res.json({
      history: overrides
        .history(session.session_id, field.data)
        .map((row) => ({ ...row, sync_status: overrides.syncStatus(row.session_id, row.id) })),
      replay: field.data ? overrides.replay(session.session_id, field.data) : undefined
    });
  });

  app.get("/api/overrides/pending", (_req, res) => {
    res.json({ pending: overrides.pendingSync() });
  });

  app.get("/api/sessions/:sessionId/vram", (req, res) => {
    const session = sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    res.json(sessions.caseStore.listVramLogs(session.session_id));
  });

  app.get("/api/sessions/:sessionId/events", (req, res) => {
    const sessionId = req.params.sessionId;
    if (!sessions.getSession(sessionId)) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = sessions.subscribe(sessionId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/sessions/:sessionId/export", (req, res) => {
    const sessionId = req.params.sessionId;
    if (!isSafeSessionId(sessionId) || !sessions.getSession(sessionId)) {
      res.status(404).json({ error: "session not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="session-${sessionId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      sessions.log(sessionId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      sessions.error(sessionId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(sessionDirAbs(sessionId), false);
    void archive.finalize();
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err);
    res.status(status).json({ error: status >= 500 ? `internal error: ${errorMessage(err)}` : errorMessage(err) });
  });

  return app;
}
