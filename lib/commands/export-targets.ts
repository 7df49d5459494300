import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import { formatApiTimestamp, formatCsv } from "../utils/csv";

export const TARGET_EXPORT_HEADER = ["Tenant", "TargetID", "TargetName", "TargetCreated", "TargetType", "TargetTags"];

/**
 * Every Target of the account as pipe-delimited lines
 */
export async function exportTargets(
  services: ZeroNorthServices,
  options: { includeHeader?: boolean } = {},
): Promise<string[]> {
  const { logger, repositories } = services;

  const tenant = await repositories.accounts.getCustomerName();
  logger.info(`Customer account: '${tenant}'`);

  const targets = await repositories.targets.listAll({
    onPage: (_page, fetched, total) =>
      logger.info(`Retrieved ${fetched}${total !== undefined ? ` of ${total}` : ""} Targets...`),
  });
  logger.info(`Found ${targets.length} Targets.`);

  const rows = targets.map((target) => [
    tenant,
    target.id,
    target.data.name,
    formatApiTimestamp(target.meta?.created),
    target.data.environmentType,
    (target.data.tags ?? []).join(","),
  ]);

  return formatCsv(TARGET_EXPORT_HEADER, rows, { delimiter: "|", includeHeader: options.includeHeader });
}
