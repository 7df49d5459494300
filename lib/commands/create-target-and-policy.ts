/**
 * Create (or reuse) a Target and a manual-upload Policy bound to it
 */

import { NotFoundError } from "../infrastructure/zeronorth/errors";
import { buildTargetPayload, buildUploadPolicyPayload } from "../infrastructure/zeronorth/payloads";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { UpsertResult } from "../infrastructure/zeronorth/types";

export interface CreateTargetAndPolicyInput {
  policyName: string;
  scenarioId: string;
  integrationId: string;
  targetName: string;
  /** Double lookup before creating; on by default for batch runs */
  findTwice?: boolean;
}

export interface CreateTargetAndPolicyResult {
  customerName: string;
  integrationType: string;
  target: UpsertResult;
  policy: UpsertResult;
}

export async function createTargetAndPolicy(
  services: ZeroNorthServices,
  input: CreateTargetAndPolicyInput,
): Promise<CreateTargetAndPolicyResult> {
  const { logger, repositories, upsert } = services;
  const findTwice = input.findTwice ?? true;

  const customerName = await repositories.accounts.getCustomerName();
  logger.info(`Customer account: '${customerName}'`);

  const integration = await repositories.integrations.findById(input.integrationId);
  if (!integration) {
    throw new NotFoundError("Integration", input.integrationId);
  }
  const integrationType = integration.data.type;
  logger.info(`Integration '${input.integrationId}' is of type '${integrationType}'.`);

  const target = await upsert.ensure(
    "targets",
    input.targetName,
    () =>
      buildTargetPayload({
        name: input.targetName,
        integrationId: input.integrationId,
        integrationType,
      }),
    { findTwice },
  );

  const policy = await upsert.ensure(
    "policies",
    input.policyName,
    () =>
      buildUploadPolicyPayload({
        name: input.policyName,
        integrationId: input.integrationId,
        integrationType,
        targetId: target.id,
        scenarioId: input.scenarioId,
      }),
    { findTwice },
  );

  return { customerName, integrationType, target, policy };
}
