/**
 * Compact Payload — the single structured artifact handed to the narrative
 * generator.
 */

import type { DatasetBundle } from "../datasets/types.js";
import { extractAllCategories } from "../metrics/extract.js";
import type { CategorySpecs, CategoryEntries } from "../metrics/types.js";

export interface CompactPayload extends CategoryEntries {
  facility: string;
}

export function buildCompactPayload(
  bundle: DatasetBundle,
  facility: string,
  specs?: CategorySpecs,
): CompactPayload {
  const entries = extractAllCategories(bundle, facility, specs);
  return {
    facility,
    patient_experience: entries.patient_experience,
    infections: entries.infections,
    readmissions: entries.readmissions,
    mortality_complications: entries.mortality_complications,
    timely_care: entries.timely_care,
  };
}

/** JSON without whitespace; key order follows the payload construction. */
export function serializeCompact(payload: CompactPayload): string {
  return JSON.stringify(payload);
}
