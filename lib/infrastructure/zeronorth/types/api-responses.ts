/**
 * ZeroNorth API Response Schemas
 *
 * Shapes of the JSON documents returned by the ZeroNorth REST API.
 * Resources come back as `{ id, data: {...}, meta: {...} }`; list endpoints
 * return a two-element array `[items, { count }]`.
 */

import { z } from "zod";

export const ResourceMetaSchema = z
  .object({
    created: z.string().optional(),
    lastModified: z.string().optional(),
  })
  .passthrough();

/**
 * Any named resource (Target, Policy, Application, User, ...)
 */
export const NamedResourceSchema = z
  .object({
    id: z.string(),
    data: z.record(z.unknown()),
    meta: ResourceMetaSchema.optional(),
  })
  .passthrough();

export type NamedResource = z.infer<typeof NamedResourceSchema>;

export const ListMetaSchema = z
  .object({
    count: z.number(),
  })
  .passthrough();

export type ListMeta = z.infer<typeof ListMetaSchema>;

export function listPageSchema<T extends z.ZodTypeAny>(itemSchema: T) {
  return z.tuple([z.array(itemSchema), ListMetaSchema]);
}

export const NamedResourceListSchema = listPageSchema(NamedResourceSchema);

export const TargetDataSchema = z
  .object({
    name: z.string(),
    environmentId: z.string().optional(),
    environmentType: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
    tags: z.array(z.string()).nullish(),
    includeRegex: z.array(z.unknown()).nullish(),
    excludeRegex: z.array(z.unknown()).nullish(),
    notifications: z.unknown().optional(),
  })
  .passthrough();

export type TargetData = z.infer<typeof TargetDataSchema>;

export const TargetSchema = NamedResourceSchema.extend({ data: TargetDataSchema });
export type Target = z.infer<typeof TargetSchema>;

export const PolicyDataSchema = z
  .object({
    name: z.string(),
    policyType: z.string().optional(),
    policySite: z.string().optional(),
    environmentId: z.string().optional(),
    environmentType: z.string().optional(),
    targets: z.array(z.object({ id: z.string() }).passthrough()).optional(),
    targetName: z.string().optional(),
    scenarioIds: z.array(z.string()).optional(),
    scenarios: z.array(z.object({ id: z.string().optional(), name: z.string() }).passthrough()).optional(),
    description: z.string().optional(),
    permanentRunOptions: z.unknown().optional(),
  })
  .passthrough();

export type PolicyData = z.infer<typeof PolicyDataSchema>;

export const PolicySchema = NamedResourceSchema.extend({ data: PolicyDataSchema });
export type Policy = z.infer<typeof PolicySchema>;

export const ApplicationDataSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    targetIds: z.array(z.string()).optional(),
    typeOfRiskEstimate: z.string().nullish(),
    technicalImpact: z.record(z.unknown()).nullish(),
    businessImpact: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type ApplicationData = z.infer<typeof ApplicationDataSchema>;

export const ApplicationSchema = NamedResourceSchema.extend({ data: ApplicationDataSchema });
export type Application = z.infer<typeof ApplicationSchema>;

export const IntegrationSchema = NamedResourceSchema.extend({
  data: z
    .object({
      name: z.string().optional(),
      type: z.string(),
    })
    .passthrough(),
});

export type Integration = z.infer<typeof IntegrationSchema>;

export const UserSchema = NamedResourceSchema.extend({
  data: z
    .object({
      name: z.string().optional(),
      email: z.string(),
      isEnabled: z.boolean().optional(),
      useMfa: z.boolean().optional(),
      auth: z
        .object({
          universal: z.array(z.object({ role: z.string() }).passthrough()).optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough(),
});

export type User = z.infer<typeof UserSchema>;

export const JobSchema = z
  .object({
    id: z.string(),
    data: z
      .object({
        status: z.string(),
        policyId: z.string().optional(),
        policyName: z.string().optional(),
      })
      .passthrough(),
    meta: ResourceMetaSchema.optional(),
  })
  .passthrough();

export type Job = z.infer<typeof JobSchema>;

export const RunPolicyResponseSchema = z
  .object({
    jobId: z.string().min(1),
  })
  .passthrough();

export const CreatedResourceSchema = z
  .object({
    id: z.string().min(1),
  })
  .passthrough();

export const AccountSchema = z
  .object({
    customer: z
      .object({
        id: z.string().optional(),
        data: z.object({ name: z.string().min(1) }).passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

export type Account = z.infer<typeof AccountSchema>;

export const SyntheticIssueSchema = z
  .object({
    id: z.string(),
    data: z
      .object({
        status: z.string().optional(),
        ignore: z.boolean().optional(),
        issueJobs: z.array(z.object({ jobId: z.string(), runTime: z.number() }).passthrough()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type SyntheticIssue = z.infer<typeof SyntheticIssueSchema>;

export const ScheduleSchema = z
  .object({
    id: z.string(),
    data: z.object({ policyId: z.string().optional() }).passthrough().optional(),
    meta: ResourceMetaSchema.extend({ etag: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type Schedule = z.infer<typeof ScheduleSchema>;

/**
 * POST /secrets answers with the generated key; it is never shown again
 */
export const CreatedSecretSchema = z
  .object({
    key: z.string().min(1),
  })
  .passthrough();

export const SecretSchema = z
  .object({
    data: z
      .object({
        type: z.string().optional(),
        secret: z.object({ username: z.string(), password: z.string() }).passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

export type Secret = z.infer<typeof SecretSchema>;

/**
 * Messages waiting in the on-prem job queue
 */
export const OnPremQueueSchema = z.array(
  z
    .object({
      payload: z.object({ jobId: z.string().nullish() }).passthrough(),
    })
    .passthrough(),
);

/**
 * Error document the API embeds in a response body
 */
export const ErrorBodySchema = z
  .object({
    statusCode: z.unknown().optional(),
    status: z.unknown().optional(),
    error: z.unknown().optional(),
    message: z.unknown().optional(),
  })
  .passthrough();
