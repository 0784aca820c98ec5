import { IllegalTransitionError } from "../core/errors";
import type {
  ClassificationResult,
  Document,
  DocumentType,
  FailureInfo,
  FieldResult,
  PipelineState,
  ValidationError,
} from "../types";

/** Allowed moves. `failed` can be re-entered at the stage that failed while retries remain. */
export const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  ingested: ["classifying", "failed"],
  classifying: ["classified", "failed"],
  classified: ["extracting", "validating", "failed"],
  extracting: ["extracted", "failed"],
  extracted: ["validating", "failed"],
  validating: ["stored", "failed"],
  stored: [],
  failed: ["classifying", "extracting"],
};

export interface TransitionUpdate {
  documentType?: DocumentType;
  classification?: ClassificationResult;
  fields?: FieldResult[];
  validationErrors?: ValidationError[];
  retryCount?: number;
  failure?: FailureInfo;
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(document: Document): document is Document & { readonly state: "stored" | "failed" } {
  return document.state === "stored" || (document.state === "failed" && document.failure?.retryable === false);
}

/**
 * Returns the next record; the input is never modified. Entering `failed` requires a failure,
 * leaving it clears the failure, and the retry count can only grow.
 */
export function transition(document: Document, to: PipelineState, update: TransitionUpdate, at: string): Document {
  if (!canTransition(document.state, to)) {
    throw new IllegalTransitionError(document.state, to);
  }
  if (to === "failed" && !update.failure) {
    throw new IllegalTransitionError(document.state, `${to} (no failure given)`);
  }
  const retryCount = update.retryCount ?? document.retryCount;
  if (retryCount < document.retryCount) {
    throw new IllegalTransitionError(document.state, `${to} (retry count ${document.retryCount} -> ${retryCount})`);
  }

  const next: Document = {
    ...document,
    state: to,
    documentType: update.documentType ?? document.documentType,
    classification: update.classification ?? document.classification,
    fields: update.fields ? Object.freeze([...update.fields]) : document.fields,
    validationErrors: update.validationErrors ? Object.freeze([...update.validationErrors]) : document.validationErrors,
    retryCount,
    failure: to === "failed" ? (update.failure ?? null) : null,
    lastTransitionedAt: at,
  };
  return Object.freeze(next);
}
