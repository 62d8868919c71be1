import type { Modality, SessionStatus } from "./types.js";

export class ModalityUnavailable extends Error {
  readonly modality: Modality;
  constructor(modality: Modality, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModalityUnavailable";
    this.modality = modality;
  }
}

export class ResourceExhausted extends Error {
  readonly stage: string;
  readonly requestedMb: number;
  readonly availableMb: number;
  readonly budgetMb: number;
  constructor(stage: string, requestedMb: number, availableMb: number, budgetMb: number, reason?: string) {
    super(
      `${stage}: requested ${requestedMb} MB with ${availableMb} of ${budgetMb} MB available` + (reason ? ` (${reason})` : "")
    );
    this.name = "ResourceExhausted";
    this.stage = stage;
    this.requestedMb = requestedMb;
    this.availableMb = availableMb;
    this.budgetMb = budgetMb;
  }
}

export class WorkerInferenceFailure extends Error {
  readonly stage: string;
  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkerInferenceFailure";
    this.stage = stage;
  }
}

export class UngroundedClaim extends Error {
  readonly passNumber: number;
  readonly unresolved: string[];
  constructor(passNumber: number, unresolved: string[], message: string) {
    super(message);
    this.name = "UngroundedClaim";
    this.passNumber = passNumber;
    this.unresolved = unresolved;
  }
}

/** The override could not be appended. Nothing was changed; the caller may retry. */
export class AuditWriteFailure extends Error {
  readonly sessionId: string;
  readonly recoverable = true;
  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditWriteFailure";
    this.sessionId = sessionId;
  }
}

export class DebateAborted extends Error {
  readonly sessionId: string;
  readonly passNumber: number;
  constructor(sessionId: string, passNumber: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DebateAborted";
    this.sessionId = sessionId;
    this.passNumber = passNumber;
  }
}

export class CasePersistenceFailure extends Error {
  readonly sessionId: string;
  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CasePersistenceFailure";
    this.sessionId = sessionId;
  }
}

export class InvalidTransition extends Error {
  readonly sessionId: string;
  readonly from: SessionStatus;
  readonly transition: string;
  constructor(sessionId: string, from: SessionStatus, transition: string, message: string) {
    super(message);
    this.name = "InvalidTransition";
    this.sessionId = sessionId;
    this.from = from;
    this.transition = transition;
  }
}

export class UnknownSession extends Error {
  readonly sessionId: string;
  constructor(sessionId: string) {
    super(`session not found: ${sessionId}`);
    this.name = "UnknownSession";
    this.sessionId = sessionId;
  }
}
