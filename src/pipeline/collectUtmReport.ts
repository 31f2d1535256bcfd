import { firstSuccess, Candidate } from "../lib/candidates";
import { describeError } from "../lib/errors";

export type UtmReportSources = {
  /** date x UTMCampaign report restricted to one source engine; may be rejected upstream. */
  fetchFiltered?: (engine: string) => Promise<unknown>;
  fetchUnfiltered: () => Promise<unknown>;
};

export type CollectedUtmReport = {
  payload: unknown;
  reportIsDirectOnly: boolean;
  warnings: string[];
};

/**
 * Fetches the UTM campaign report, preferring the Direct-engine filtered
 * variant and falling back to the unfiltered one with a warning.
 */
export async function collectUtmReport(
  sources: UtmReportSources,
  params: { pickedEngine: string | null }
): Promise<CollectedUtmReport> {
  const candidates: Candidate<{ payload: unknown; directOnly: boolean }>[] = [];
  const { pickedEngine } = params;
  const { fetchFiltered } = sources;
  if (pickedEngine && fetchFiltered) {
    candidates.push({
      label: "engine-filtered",
      run: async () => ({ payload: await fetchFiltered(pickedEngine), directOnly: true }),
    });
  }
  candidates.push({
    label: "unfiltered",
    run: async () => ({ payload: await sources.fetchUnfiltered(), directOnly: false }),
  });

  const result = await firstSuccess(candidates);
  const warnings = result.failures.map(
    (failure) =>
      `UTM campaign report (${failure.label}) rejected, using unfiltered report: ${describeError(failure.error)}`
  );
  return { payload: result.value.payload, reportIsDirectOnly: result.value.directOnly, warnings };
}
