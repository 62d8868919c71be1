import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { DrugInteractionWorker, LanguageWorker, WorkerRegistry } from "./pipeline/workers.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { setDefaultOpenAIKey } = await import("@openai/agents");
const { loadServerConfig, TriagePolicyStore } = await import("./config.js");
const { FileCaseStore } = await import("./pipeline/store.js");
const { SessionManager } = await import("./session_manager.js");
const { SessionExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { ResourceLeaseGovernor } = await import("./pipeline/lease_governor.js");
const { VramRecorder } = await import("./pipeline/vram_recorder.js");
const { OverrideAuditLog, OverrideSyncLedger } = await import("./pipeline/override_log.js");
const { RemoteReviewSync, axiosSyncTransport } = await import("./pipeline/remote_sync.js");
const { createOncologyPipeline } = await import("./pipeline/oncology_pipeline.js");
const { createFakeRegistry, FakeDrugInteractionWorker, FakeLanguageWorker } = await import("./pipeline/fake_workers.js");
const { createHttpClient, createHttpRegistry, HttpDrugInteractionWorker } = await import("./pipeline/http_worker.js");
const { AgentLanguageWorker } = await import("./pipeline/agent_worker.js");

const config = loadServerConfig();

const sessions = new SessionManager(new FileCaseStore());
await sessions.initFromDisk();

const recorder = new VramRecorder(sessions);
const governor = new ResourceLeaseGovernor({
  budgetMb: config.maxVramMb,
  mode: config.leaseMode,
  waitTimeoutMs: config.leaseWaitTimeoutMs,
  tickIntervalMs: config.tickIntervalMs,
  onSample: recorder.record
});

const policy = await TriagePolicyStore.load();

let registry: WorkerRegistry;
let language: LanguageWorker;
let interactions: DrugInteractionWorker;
if (config.pipelineMode === "live") {
  if (!config.workerUrl) throw new Error("ONCO_PIPELINE_MODE=live requires ONCO_WORKER_URL");
  const key = process.env.OPENAI_API_KEY?.trim();
  if (key) setDefaultOpenAIKey(key);
  else console.log("OPENAI_API_KEY is not set; persona passes will fail until it is");
  registry = createHttpRegistry(config.workerUrl);
  language = new AgentLanguageWorker();
  interactions = new HttpDrugInteractionWorker(createHttpClient(config.workerUrl));
} else {
  console.log("server pipeline mode: fake (ONCO_PIPELINE_MODE=fake)");
  registry = createFakeRegistry();
  language = new FakeLanguageWorker();
  interactions = new FakeDrugInteractionWorker();
}

const pipeline = createOncologyPipeline({
  registry,
  language,
  governor,
  escalation: policy.escalation,
  staging: policy.staging,
  interactions
});

const executor = new SessionExecutor(sessions, pipeline, governor, { concurrency: config.maxConcurrentSessions });

const sync = new RemoteReviewSync({
  transport: config.syncUrl ? axiosSyncTransport(config.syncUrl) : null,
  maxAttempts: config.syncMaxAttempts,
  ledger: new OverrideSyncLedger(sessions),
  onEvent: (event) => {
    switch (event.type) {
      case "delivered":
        return;
      case "retry":
        sessions.error(
          event.payload.session_id,
          `Override sync attempt ${event.attempt} failed (${event.error}); retrying in ${event.delayMs} ms`,
          "remote_sync"
        );
        return;
      case "failed":
        sessions.error(event.payload.session_id, `Override sync gave up after ${event.attempt} attempts: ${event.error}`, "remote_sync");
        return;
      case "unrecorded":
        sessions.error(event.payload.session_id, `Override sync outcome not saved: ${event.error}`, "remote_sync");
        return;
    }
  }
});

const overrides = new OverrideAuditLog(sessions, sync);
const resumed = overrides.resumePendingSync();
if (resumed > 0) console.log(`re-queued ${resumed} override(s) for remote review`);
const app = createApp({ sessions, executor, governor, overrides, policy, sync, mode: config.pipelineMode });

app.listen(config.port, () => {
  console.log(`server listening on http://localhost:${config.port}`);
});
