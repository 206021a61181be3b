import type { CollaboratorFailureKind } from '@examcraft/contracts';

/**
 * Contract with the generative-model provider. The core only ever sees text or
 * a failure; retries, backoff and timeouts live behind this interface.
 */

export interface ModelCallRequest {
  systemPrompt: string;
  userPrompt: string;
  wantJson: boolean;
}

export interface ModelCallMeta {
  provider: string;
  model: string;
  attemptCount: number;
  retried: boolean;
  status: number | null;
  latencyMs: number;
}

export interface CollaboratorFailure {
  kind: CollaboratorFailureKind;
  message: string;
  status: number | null;
}

export type ModelCallResult =
  | { success: true; text: string; meta: ModelCallMeta }
  | { success: false; failure: CollaboratorFailure; meta: ModelCallMeta };

export interface ModelCaller {
  readonly provider: string;
  readonly model: string;
  call(request: ModelCallRequest): Promise<ModelCallResult>;
}
