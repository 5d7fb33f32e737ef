/**
 * IAM Admin Role Audit
 *
 * Finds roles whose attached or inline policy names suggest administrator
 * or full-access permissions. Only names are inspected, not policy
 * documents.
 */

import {
  IAMClient,
  ListAttachedRolePoliciesCommand,
  ListRolePoliciesCommand,
  ListRolesCommand,
} from "@aws-sdk/client-iam";

import type { Logger } from "../logging/logger.js";
import { formatErrorMessage } from "../utils/errors.js";
import { processPooled } from "../utils/pool.js";

export const ADMIN_POLICY_PATTERN = /admin|fullaccess|Administrator|FullAccess|Admin/;

export type AdminRoleFinding = {
  roleName: string;
  policies: string[];
};

export function createIAMClient(region?: string): IAMClient {
  return new IAMClient({
    region: region || process.env.AWS_REGION || "us-east-1",
  });
}

export function isAdminPolicyName(policyName: string): boolean {
  return ADMIN_POLICY_PATTERN.test(policyName);
}

/**
 * Every role name in the account, following `Marker` pagination.
 */
export async function listRoleNames(client: IAMClient): Promise<string[]> {
  const names: string[] = [];
  let marker: string | undefined;

  do {
    const response = await client.send(new ListRolesCommand({ Marker: marker }));
    for (const role of response.Roles || []) {
      if (role.RoleName) names.push(role.RoleName);
    }
    marker = response.IsTruncated ? response.Marker : undefined;
  } while (marker);

  return names;
}

async function listAttachedPolicyNames(client: IAMClient, roleName: string): Promise<string[]> {
  const names: string[] = [];
  let marker: string | undefined;

  do {
    const response = await client.send(
      new ListAttachedRolePoliciesCommand({ RoleName: roleName, Marker: marker }),
    );
    for (const policy of response.AttachedPolicies || []) {
      if (policy.PolicyName) names.push(policy.PolicyName);
    }
    marker = response.IsTruncated ? response.Marker : undefined;
  } while (marker);

  return names;
}

async function listInlinePolicyNames(client: IAMClient, roleName: string): Promise<string[]> {
  const names: string[] = [];
  let marker: string | undefined;

  do {
    const response = await client.send(new ListRolePoliciesCommand({ RoleName: roleName, Marker: marker }));
    names.push(...(response.PolicyNames || []));
    marker = response.IsTruncated ? response.Marker : undefined;
  } while (marker);

  return names;
}

/**
 * Admin-looking policy names on one role: attached managed policies first,
 * then inline policies.
 */
export async function findAdminPolicies(client: IAMClient, roleName: string): Promise<string[]> {
  const attached = await listAttachedPolicyNames(client, roleName);
  const inline = await listInlinePolicyNames(client, roleName);
  return [...attached, ...inline].filter(isAdminPolicyName);
}

export type AuditAdminRolesOptions = {
  concurrency: number;
};

/**
 * Audit every role. A role whose policies cannot be listed is logged and
 * left out; a failure to list the roles themselves propagates.
 */
export async function auditAdminRoles(
  client: IAMClient,
  options: AuditAdminRolesOptions,
  logger: Logger,
): Promise<AdminRoleFinding[]> {
  const roleNames = await listRoleNames(client);
  logger.debug(`Checking policies of ${roleNames.length} roles`);

  const findings = await processPooled(
    roleNames,
    async (roleName): Promise<AdminRoleFinding | null> => {
      try {
        const policies = await findAdminPolicies(client, roleName);
        return policies.length > 0 ? { roleName, policies } : null;
      } catch (err) {
        logger.error(`Failed to list policies for role ${roleName}: ${formatErrorMessage(err)}`);
        return null;
      }
    },
    { concurrency: options.concurrency },
  );

  return findings.filter((finding): finding is AdminRoleFinding => finding !== null);
}

/**
 * Two-column table: role name padded to 35, policies joined by ", ".
 */
export function formatAdminRoleTable(findings: readonly AdminRoleFinding[]): string[] {
  const row = (role: string, policies: string) => `${role.padEnd(35)} ${policies}`;
  return [
    row("Role Name", "Relevant Policies"),
    row("-".repeat(35), "-".repeat(70)),
    ...findings.map((finding) => row(finding.roleName, finding.policies.join(", "))),
  ];
}
