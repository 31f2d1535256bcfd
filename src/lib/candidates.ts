import { AllCandidatesFailedError } from "./errors";

export type Candidate<T> = {
  label: string;
  run: () => Promise<T>;
};

export type CandidateSuccess<T> = {
  value: T;
  label: string;
  index: number;
  failures: Array<{ label: string; error: unknown }>;
};

/**
 * Runs candidates in order and returns the first one that resolves.
 * Earlier failures are kept so callers can surface them as warnings.
 */
export async function firstSuccess<T>(candidates: Candidate<T>[]): Promise<CandidateSuccess<T>> {
  if (!candidates.length) throw new Error("firstSuccess needs at least one candidate");
  const failures: Array<{ label: string; error: unknown }> = [];
  for (let index = 0; index < candidates.length; index += 1) {
    const candidate = candidates[index];
    try {
      const value = await candidate.run();
      return { value, label: candidate.label, index, failures };
    } catch (error) {
      failures.push({ label: candidate.label, error });
    }
  }
  throw new AllCandidatesFailedError(failures.map((failure) => failure.error));
}
