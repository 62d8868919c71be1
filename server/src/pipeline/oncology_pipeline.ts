import type { PipelineFn } from "../executor.js";
import { CaseBuilder, type TreatmentRouter } from "./case_builder.js";
import { createSessionContext, throwIfCancelled } from "./context.js";
import type { ResourceLeaseGovernor } from "./lease_governor.js";
import { ModeBridge, type EscalationPolicy } from "./mode_bridge.js";
import { PersonaDebateEngine } from "./persona_debate.js";
import type { PersonaSpec } from "./personas.js";
import type { StagingPolicy } from "./risk_engine.js";
import { CortexController } from "./scheduler.js";
import type { DrugInteractionWorker, LanguageWorker, WorkerRegistry } from "./workers.js";

export type OncologyPipelineDeps = {
  registry: WorkerRegistry;
  language: LanguageWorker;
  governor: ResourceLeaseGovernor;
  escalation: () => EscalationPolicy;
  staging: () => StagingPolicy;
  router?: TreatmentRouter;
  interactions?: DrugInteractionWorker;
  personas?: readonly PersonaSpec[];
};

/**
 * Triage, escalation, debate and case assembly. Each stage is chosen from the
 * session's current status, so a session resting at ESCALATED or DEBATE picks
 * up where it stopped.
 */
export function createOncologyPipeline(deps: OncologyPipelineDeps): PipelineFn {
  const scheduler = new CortexController(deps.registry);
  const bridge = new ModeBridge(deps.escalation);
  const debate = new PersonaDebateEngine(deps.language, deps.personas);
  const builder = new CaseBuilder({
    router: deps.router,
    interactions: deps.interactions,
    staging: deps.staging,
    escalation: deps.escalation
  });

  return async ({ sessionId }, sessions, options) => {
    const ctx = createSessionContext({ sessionId, sessions, governor: deps.governor, signal: options.signal });
    const status = () => sessions.requireSession(sessionId).status;

    if (status() === "INITIALIZED") {
      const report = await scheduler.run(ctx);
      sessions.log(sessionId, `Triage complete (${report.degradation}) in ${report.batches.length} batch(es)`, "scheduler");
    }
    throwIfCancelled(ctx);

    if (status() === "TRIAGE") {
      const decision = await bridge.apply(ctx);
      if (!decision.escalate) return;
    }
    throwIfCancelled(ctx);

    const current = status();
    if (current !== "ESCALATED" && current !== "DEBATE") {
      throw new Error(`nothing to run for a ${current} session`);
    }
    await debate.run(ctx);
    throwIfCancelled(ctx);
    await builder.build(ctx);
  };
}
