/**
 * Measure Metadata — display names, units and directionality.
 *
 * Only measures whose unit and direction are known with confidence are listed;
 * everything else falls back to the identifier with "unknown" unit/direction.
 */

export type MeasureUnit =
  | "percent"
  | "minutes"
  | "sir"
  | "rate"
  | "linear_mean"
  | "category"
  | "unknown";

export type Directionality = "lower" | "higher" | "context" | "unknown";

export interface MeasureMeta {
  name: string;
  unit: MeasureUnit;
  better: Directionality;
}

export const MEASURE_META: Readonly<Record<string, MeasureMeta>> = {
  // ── ED flow (minutes; lower is better) ──
  OP_18b: { name: "ED throughput time (median)", unit: "minutes", better: "lower" },
  OP_18c: { name: "ED throughput time (median) - psych/mental health", unit: "minutes", better: "lower" },
  OP_22: { name: "ED access measure (OP_22)", unit: "percent", better: "lower" },

  // ── Sepsis (percent; higher is better) ──
  SEP_1: { name: "Sepsis bundle (SEP-1)", unit: "percent", better: "higher" },
  SEP_SH_3HR: { name: "Septic shock care within 3 hours", unit: "percent", better: "higher" },
  SEP_SH_6HR: { name: "Septic shock care within 6 hours", unit: "percent", better: "higher" },
  SEV_SEP_3HR: { name: "Severe sepsis care within 3 hours", unit: "percent", better: "higher" },
  SEV_SEP_6HR: { name: "Severe sepsis care within 6 hours", unit: "percent", better: "higher" },

  // ── Prevention / safety (percent; higher is better) ──
  IMM_3: { name: "Healthcare personnel influenza vaccination", unit: "percent", better: "higher" },
  VTE_1: { name: "VTE prophylaxis", unit: "percent", better: "higher" },
  VTE_2: { name: "VTE prophylaxis (additional)", unit: "percent", better: "higher" },
  HCP_COVID_19: { name: "Healthcare personnel COVID-19 vaccination", unit: "percent", better: "higher" },

  // ED volume is a context category, not good/bad
  EDV: { name: "Emergency department volume", unit: "category", better: "context" },
};

export function metaFor(measureId: unknown): MeasureMeta {
  const id = String(measureId ?? "").trim();
  return Object.hasOwn(MEASURE_META, id)
    ? MEASURE_META[id]
    : { name: id, unit: "unknown", better: "unknown" };
}
