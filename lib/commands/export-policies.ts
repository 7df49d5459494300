import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import { formatCsv } from "../utils/csv";

export const POLICY_EXPORT_HEADER = [
  "polId",
  "polName",
  "tgtId",
  "tgtName",
  "tgtType",
  "scenarioId",
  "scenarioName",
];

/**
 * Every Policy with its first Target and Scenario, pipe-delimited
 */
export async function exportPolicies(
  services: ZeroNorthServices,
  options: { includeHeader?: boolean } = {},
): Promise<string[]> {
  const { logger, repositories } = services;

  logger.info("Retrieving Policies list...");
  const policies = await repositories.policies.listAll();
  logger.info(`Found ${policies.length} Policies.`);

  const rows = policies.map((policy) => {
    const target = policy.data.targets?.[0];
    const scenario = policy.data.scenarios?.[0];
    return [
      policy.id,
      policy.data.name,
      target?.id,
      policy.data.targetName,
      policy.data.environmentType,
      scenario?.id,
      scenario?.name,
    ];
  });

  return formatCsv(POLICY_EXPORT_HEADER, rows, { delimiter: "|", includeHeader: options.includeHeader });
}
