import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { SyntheticIssue } from "../infrastructure/zeronorth/types";

export interface SyntheticIssuesQuery {
  targetId: string;
  /** Only issues seen since this date (YYYY-MM-DD) */
  since?: string;
}

export async function exportSyntheticIssues(
  services: ZeroNorthServices,
  query: SyntheticIssuesQuery,
): Promise<SyntheticIssue[]> {
  const { logger, repositories } = services;

  const issues = await repositories.syntheticIssues.listAll({
    query: { targetId: query.targetId, since: query.since },
    onPage: (_page, fetched) => logger.info(`Retrieved ${fetched} issues...`),
  });
  logger.info(`Found ${issues.length} synthetic issues for Target '${query.targetId}'.`);
  return issues;
}
