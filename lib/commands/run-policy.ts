import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { JobOutcome } from "../infrastructure/zeronorth/types";

export interface RunPolicyInput {
  /** Policy ID, or a name that resolves to exactly one Policy */
  policy: string;
  runOptions?: Record<string, unknown>;
  wait?: boolean;
  signal?: AbortSignal;
}

export async function runPolicy(services: ZeroNorthServices, input: RunPolicyInput): Promise<JobOutcome> {
  const policyId = await services.resolver.resolveIdOrName("policies", input.policy);
  const driver = services.createJobDriver();
  return driver.runAndWait(policyId, {
    runOptions: input.runOptions,
    wait: input.wait,
    signal: input.signal,
  });
}
