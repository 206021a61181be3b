import type { BatchReportDto } from '@examcraft/contracts';
import { buildRejection, type IngestRejection } from './errors';
import { ingestQuestionElements, BATCH_ENVELOPE_FIELD, type RejectedElement } from './batch';
import { assembleReadingMaterial, type CrossReferenceMismatch, type GeneratedReadingMaterial } from './linker';
import { ingestAssetValue, isRecord, type IngestOptions } from './pipeline';

export interface ReadingMaterialOptions extends Omit<IngestOptions, 'defaults' | 'expectedType'> {
  /** Defaults to the number of questions the document carries. */
  requestedCount?: number;
  assetDefaults?: Record<string, unknown>;
}

export type ReadingMaterialOutcome =
  | {
    success: true;
    data: GeneratedReadingMaterial;
    rejected: RejectedElement[];
    mismatches: CrossReferenceMismatch[];
    report: BatchReportDto;
  }
  | {
    success: false;
    error: IngestRejection;
    rejected: RejectedElement[];
    mismatches: CrossReferenceMismatch[];
    report: BatchReportDto | null;
  };

function fail(error: IngestRejection): ReadingMaterialOutcome {
  return { success: false, error, rejected: [], mismatches: [], report: null };
}

/**
 * Ingests a whole `{passageAsset, questions_list}` document as one generation
 * unit: the passage first, then every question, then the cross-reference check.
 */
export function ingestReadingMaterial(raw: string, options: ReadingMaterialOptions = {}): ReadingMaterialOutcome {
  if (raw.trim().length === 0) {
    return fail(buildRejection({
      code: 'empty_response',
      failedAt: 'raw_received',
      message: 'model returned empty text',
      raw,
    }));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return fail(buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message: error instanceof Error ? error.message : String(error),
      raw,
    }));
  }
  if (!isRecord(parsed)) {
    return fail(buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message: 'top-level JSON value must be an object',
      raw,
    }));
  }

  const passage = ingestAssetValue(parsed.passageAsset, {
    ...options,
    defaults: { assetType: 'PASSAGE', ...(options.assetDefaults ?? {}) },
    expectedType: 'PASSAGE',
  });
  if (!passage.success) return fail(passage.error);
  if (passage.data.assetType !== 'PASSAGE') {
    return fail(buildRejection({
      code: 'unknown_discriminator',
      failedAt: 'resolution_failed',
      message: `passageAsset must be a PASSAGE, got ${passage.data.assetType}`,
      raw,
    }));
  }
  const passageAsset = passage.data;

  const elements = parsed[BATCH_ENVELOPE_FIELD];
  if (!Array.isArray(elements)) {
    return fail(buildRejection({
      code: 'invariant_violation',
      failedAt: 'validation_failed',
      message: `${BATCH_ENVELOPE_FIELD} must be an array`,
      violations: [{
        rule: elements === undefined ? 'required_field' : 'type_mismatch',
        field: BATCH_ENVELOPE_FIELD,
        message: `${BATCH_ENVELOPE_FIELD} must be an array of question objects`,
      }],
      raw,
    }));
  }

  const batch = ingestQuestionElements(elements, {
    ...options,
    requestedCount: options.requestedCount ?? elements.length,
    defaults: {
      questionType: 'READING_COMPREHENSION',
      difficulty: passageAsset.difficulty,
      learningObjectives: passageAsset.learningObjectives,
    },
  });
  if (!batch.success) {
    return { ...batch, mismatches: [] };
  }

  const { material, mismatches } = assembleReadingMaterial(passageAsset, batch.data);
  const report: BatchReportDto = {
    ...batch.report,
    acceptedCount: material.questions_list.length,
    needsTopUp: material.questions_list.length < batch.report.requestedCount,
  };
  if (material.questions_list.length === 0) {
    return {
      success: false,
      error: buildRejection({
        code: 'cross_reference_mismatch',
        failedAt: 'rejected',
        message: `no question references passage "${passageAsset.assetId}"`,
      }),
      rejected: batch.rejected,
      mismatches,
      report,
    };
  }
  return { success: true, data: material, rejected: batch.rejected, mismatches, report };
}
