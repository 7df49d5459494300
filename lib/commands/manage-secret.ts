/**
 * usernamePassword secrets: add, read back or delete by key.
 * The key returned by `addSecret` is shown once; the API never reveals it again.
 */

import { NotFoundError, ZeroNorthConfigError } from "../infrastructure/zeronorth/errors";
import { buildSecretPayload } from "../infrastructure/zeronorth/payloads";
import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";

export interface SecretCredentials {
  username: string;
  password: string;
  description?: string;
}

async function logCustomer(services: ZeroNorthServices): Promise<void> {
  const customerName = await services.repositories.accounts.getCustomerName();
  services.logger.info(`Customer: '${customerName}'`);
}

export async function addSecret(services: ZeroNorthServices, credentials: SecretCredentials): Promise<string> {
  if (!credentials.username || !credentials.password) {
    throw new ZeroNorthConfigError("Both a username and a password are required");
  }
  await logCustomer(services);

  services.logger.info("Creating a new secret of type 'usernamePassword'...");
  return services.repositories.secrets.create(
    buildSecretPayload(
      credentials.username,
      credentials.password,
      credentials.description ?? "Added by zn-secret-username-password",
    ),
  );
}

/**
 * `username:password` of the secret
 */
export async function getSecret(services: ZeroNorthServices, key: string): Promise<string> {
  await logCustomer(services);

  const secret = await services.repositories.secrets.findByKey(key);
  if (!secret) {
    throw new NotFoundError("Secret", key);
  }
  return `${secret.data.secret.username}:${secret.data.secret.password}`;
}

export async function deleteSecret(services: ZeroNorthServices, key: string): Promise<void> {
  await logCustomer(services);

  await services.repositories.secrets.delete(key);
  services.logger.info("Secret deleted.");
}
