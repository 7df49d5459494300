import type { ZeroNorthServices } from "../infrastructure/zeronorth/repositories";
import type { User } from "../infrastructure/zeronorth/types";
import { formatCsv, type CsvValue } from "../utils/csv";

export const USER_EXPORT_HEADER = [
  "customerName",
  "userId",
  "userName",
  "userEmail",
  "role",
  "isEnabled",
  "isSSOUser",
];

/**
 * One row per user and role; a user without roles has no row.
 * Users without MFA are signed in through SSO.
 */
function userRows(customerName: string, user: User): CsvValue[][] {
  const roles = user.data.auth?.universal?.map((entry) => entry.role) ?? [];
  const base = [customerName, user.id, user.data.name, user.data.email];
  const tail = [user.data.isEnabled ?? "", user.data.useMfa ? "false" : "true"];
  return roles.map((role) => [...base, role, ...tail]);
}

/**
 * Users of the account as CSV; `email` narrows to one user (case-insensitive)
 */
export async function listUsers(
  services: ZeroNorthServices,
  options: { email?: string; includeHeader?: boolean } = {},
): Promise<string[]> {
  const { logger, repositories } = services;

  const customerName = await repositories.accounts.getCustomerName();
  logger.info(`Customer account = '${customerName}'`);

  const users = await repositories.users.listAll();
  const wanted = options.email?.toLowerCase();
  const selected = wanted ? users.filter((user) => user.data.email.toLowerCase() === wanted) : users;
  logger.info(`Found ${selected.length} Users.`);

  const rows = selected.flatMap((user) => userRows(customerName, user));
  return formatCsv(USER_EXPORT_HEADER, rows, { includeHeader: options.includeHeader });
}
