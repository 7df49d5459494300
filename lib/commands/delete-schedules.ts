/**
 * Schedule cleanup: every schedule of an account, or the leftover
 * schedules of a Policy that was deleted.
 */

import { describeError, ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";

export interface PolicySchedule {
  policyId: string;
  policyName: string;
  scheduleId: string;
  etag?: string;
}

export interface ScheduleDeleteResult {
  schedules: PolicySchedule[];
  deleted: number;
  failed: number;
}

export interface DeleteAllSchedulesOptions {
  /** Must equal the account's customer name exactly */
  customerName: string;
  /** List what would be deleted without deleting */
  dryRun?: boolean;
  /** Called with the inventory before anything is deleted; false aborts */
  confirm?: (schedules: PolicySchedule[]) => Promise<boolean>;
}

async function deleteEach(services: ZeroNorthServices, schedules: PolicySchedule[]): Promise<ScheduleDeleteResult> {
  const { logger, repositories } = services;
  let deleted = 0;
  let failed = 0;

  for (const schedule of schedules) {
    logger.info(`Deleting schedule ${schedule.scheduleId} of Policy '${schedule.policyName}'...`);
    try {
      await repositories.schedules.delete(schedule.policyId, schedule.scheduleId, schedule.etag);
      deleted++;
    } catch (error) {
      failed++;
      logger.warn(`Problem deleting schedule ${schedule.scheduleId}, continuing: ${describeError(error)}`);
    }
  }

  return { schedules, deleted, failed };
}

/**
 * Delete the schedules of every Policy in the account
 */
export async function deleteAllSchedules(
  services: ZeroNorthServices,
  options: DeleteAllSchedulesOptions,
): Promise<ScheduleDeleteResult> {
  const { logger, repositories } = services;

  const customerName = await repositories.accounts.getCustomerName();
  if (customerName !== options.customerName) {
    throw new ZeroNorthConfigError(
      `Customer name '${customerName}' does not match the specified customer name '${options.customerName}'`,
    );
  }
  logger.info(`Customer name '${customerName}' validated.`);

  const policies = await repositories.policies.listAll();
  logger.info(`There are ${policies.length} policies in total.`);

  const schedules: PolicySchedule[] = [];
  for (const policy of policies) {
    for (const schedule of await repositories.schedules.listForPolicy(policy.id)) {
      schedules.push({
        policyId: policy.id,
        policyName: policy.data.name,
        scheduleId: schedule.id,
        etag: schedule.meta?.etag,
      });
    }
  }

  if (schedules.length === 0) {
    logger.info("No schedules to delete.");
    return { schedules, deleted: 0, failed: 0 };
  }
  const policyCount = new Set(schedules.map((schedule) => schedule.policyId)).size;
  logger.info(`Found ${schedules.length} schedules across ${policyCount} Policies.`);

  if (options.dryRun) {
    logger.info("Dry run, nothing deleted.");
    return { schedules, deleted: 0, failed: 0 };
  }
  if (options.confirm && !(await options.confirm(schedules))) {
    throw new ZeroNorthConfigError("Schedule deletion was not confirmed");
  }

  return deleteEach(services, schedules);
}

/**
 * Delete the schedules left behind by a Policy that no longer exists.
 * Refuses to touch the schedules of a Policy that is still there.
 */
export async function deleteOrphanSchedules(services: ZeroNorthServices, policyId: string): Promise<ScheduleDeleteResult> {
  const { logger, repositories } = services;

  const policy = await repositories.policies.findById(policyId);
  if (policy) {
    throw new ZeroNorthConfigError(`Policy with ID '${policyId}' still exists`);
  }
  logger.info(`No Policy with ID '${policyId}'. Safe to proceed.`);

  const schedules = (await repositories.schedules.listForPolicy(policyId)).map((schedule) => ({
    policyId: schedule.data?.policyId ?? policyId,
    policyName: policyId,
    scheduleId: schedule.id,
    etag: schedule.meta?.etag,
  }));
  logger.info(`Found ${schedules.length} Schedules to delete.`);

  return deleteEach(services, schedules);
}
