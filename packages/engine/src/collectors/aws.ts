/**
 * AWS IAM collector.
 *
 * Reads the account's IAM state with GetAccountAuthorizationDetails (users,
 * groups, managed policy default versions and inline documents in one paged
 * call), then fills in per-user access keys, key last-used dates and MFA
 * devices. Read-only: nothing here writes to the account.
 */

import {
  GetAccessKeyLastUsedCommand,
  GetAccountAuthorizationDetailsCommand,
  IAMClient,
  ListAccessKeysCommand,
  ListMFADevicesCommand,
  type AccessKeyMetadata,
  type AttachedPolicy,
  type GetAccountAuthorizationDetailsResponse,
  type ManagedPolicyDetail,
  type PolicyDetail,
  type Tag,
} from "@aws-sdk/client-iam";
import { fromIni } from "@aws-sdk/credential-providers";
import { CollectionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { AccessKeyInput, PolicyInput, SnapshotInput, UserInput } from "../snapshot/input.js";
import { decodePolicyDocument } from "../snapshot/policy.js";
import { createSnapshot } from "../snapshot/snapshot.js";
import type { Snapshot } from "../snapshot/types.js";
import type { SnapshotCollector } from "./types.js";

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export interface AccessKeyPage {
  keys: AccessKeyMetadata[];
  marker?: string;
}

/**
 * The IAM calls the collector makes, one page at a time. Implemented over
 * the SDK client by `createAwsIamGateway`; tests supply an in-memory fake.
 */
export interface IamGateway {
  getAccountAuthorizationDetails(marker?: string): Promise<GetAccountAuthorizationDetailsResponse>;
  listAccessKeys(userName: string, marker?: string): Promise<AccessKeyPage>;
  /** Undefined when the key has never been used. */
  getAccessKeyLastUsed(accessKeyId: string): Promise<Date | undefined>;
  /** Number of MFA devices on the first page (any device means enabled). */
  countMfaDevices(userName: string): Promise<number>;
}

export function createAwsIamGateway(client: IAMClient): IamGateway {
  return {
    async getAccountAuthorizationDetails(marker) {
      return client.send(
        new GetAccountAuthorizationDetailsCommand({
          Filter: ["User", "Group", "LocalManagedPolicy", "AWSManagedPolicy"],
          Marker: marker,
        }),
      );
    },

    async listAccessKeys(userName, marker) {
      const res = await client.send(new ListAccessKeysCommand({ UserName: userName, Marker: marker }));
      return {
        keys: res.AccessKeyMetadata ?? [],
        marker: res.IsTruncated ? res.Marker : undefined,
      };
    },

    async getAccessKeyLastUsed(accessKeyId) {
      const res = await client.send(new GetAccessKeyLastUsedCommand({ AccessKeyId: accessKeyId }));
      return res.AccessKeyLastUsed?.LastUsedDate;
    },

    async countMfaDevices(userName) {
      const res = await client.send(new ListMFADevicesCommand({ UserName: userName }));
      return res.MFADevices?.length ?? 0;
    },
  };
}

// ---------------------------------------------------------------------------
// Collector
// ---------------------------------------------------------------------------

export interface AwsIamCollectorOptions {
  /** Named profile from the shared credentials file; default chain otherwise. */
  profile?: string;
  region?: string;
  /** Users whose keys and MFA devices are fetched at the same time. */
  concurrency?: number;
  /** Overrides the SDK-backed gateway. */
  gateway?: IamGateway;
  now?: () => Date;
}

/** IAM is a global service; the SDK still wants a region for signing. */
const DEFAULT_REGION = "us-east-1";

function isNoSuchEntity(err: unknown): boolean {
  return err instanceof Error && (err.name === "NoSuchEntityException" || err.name === "NoSuchEntity");
}

/** 123456789012 from arn:aws:iam::123456789012:user/alice */
export function accountFromArn(arn: string | undefined): string | undefined {
  const account = arn?.split(":")[4];
  return account ? account : undefined;
}

function toTags(tags: Tag[] | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) result[tag.Key] = tag.Value ?? "";
  }
  return result;
}

export class AwsIamCollector implements SnapshotCollector {
  readonly provider = "aws";
  private readonly gateway: IamGateway;
  private readonly concurrency: number;

  constructor(private readonly options: AwsIamCollectorOptions = {}) {
    this.gateway =
      options.gateway ??
      createAwsIamGateway(
        new IAMClient({
          region: options.region ?? DEFAULT_REGION,
          ...(options.profile ? { credentials: fromIni({ profile: options.profile }) } : {}),
        }),
      );
    this.concurrency = Math.max(1, options.concurrency ?? 5);
  }

  async collect(): Promise<Snapshot> {
    const details = await this.call("GetAccountAuthorizationDetails", () => this.readAuthorizationDetails());

    const documents = new Map<string, string>();
    for (const policy of details.policies) {
      const doc = defaultVersionDocument(policy);
      if (policy.Arn && doc !== undefined) documents.set(policy.Arn, doc);
    }

    const users: UserInput[] = [];
    for (let i = 0; i < details.users.length; i += this.concurrency) {
      const batch = details.users.slice(i, i + this.concurrency);
      users.push(...(await Promise.all(batch.map((u) => this.toUser(u, documents)))));
    }

    const groups = details.groups.map((g) => ({
      name: g.GroupName ?? "",
      id: g.GroupId,
      arn: g.Arn,
      attachedPolicies: this.managedPolicies(g.AttachedManagedPolicies, documents),
      inlinePolicies: this.inlinePolicies(g.GroupPolicyList, `group '${g.GroupName ?? ""}'`),
    }));

    const input: SnapshotInput = {
      provider: this.provider,
      account: accountFromArn(details.users[0]?.Arn),
      users,
      groups,
    };

    logger.info(`[aws] Collected ${users.length} users, ${groups.length} groups, ${details.policies.length} managed policies`);

    return createSnapshot(input, { now: this.options.now });
  }

  private async readAuthorizationDetails(): Promise<{
    users: NonNullable<GetAccountAuthorizationDetailsResponse["UserDetailList"]>;
    groups: NonNullable<GetAccountAuthorizationDetailsResponse["GroupDetailList"]>;
    policies: ManagedPolicyDetail[];
  }> {
    const users: NonNullable<GetAccountAuthorizationDetailsResponse["UserDetailList"]> = [];
    const groups: NonNullable<GetAccountAuthorizationDetailsResponse["GroupDetailList"]> = [];
    const policies: ManagedPolicyDetail[] = [];

    let marker: string | undefined;
    let page = 0;
    do {
      const res = await this.gateway.getAccountAuthorizationDetails(marker);
      page++;
      users.push(...(res.UserDetailList ?? []));
      groups.push(...(res.GroupDetailList ?? []));
      policies.push(...(res.Policies ?? []));
      marker = res.IsTruncated ? res.Marker : undefined;
      logger.debug(`[aws] Authorization details page ${page}${marker ? " (more)" : ""}`);
    } while (marker);

    return { users, groups, policies };
  }

  private async toUser(
    user: NonNullable<GetAccountAuthorizationDetailsResponse["UserDetailList"]>[number],
    documents: ReadonlyMap<string, string>,
  ): Promise<UserInput> {
    const name = user.UserName ?? "";
    const [accessKeys, mfaEnabled] = await Promise.all([
      this.call(`ListAccessKeys(${name})`, () => this.readAccessKeys(name)),
      this.call(`ListMFADevices(${name})`, () => this.readMfaEnabled(name)),
    ]);

    return {
      name,
      id: user.UserId,
      arn: user.Arn,
      createdAt: user.CreateDate ?? new Date(0),
      mfaEnabled,
      groups: user.GroupList ?? [],
      accessKeys,
      attachedPolicies: this.managedPolicies(user.AttachedManagedPolicies, documents),
      inlinePolicies: this.inlinePolicies(user.UserPolicyList, `user '${name}'`),
      tags: toTags(user.Tags),
    };
  }

  private async readAccessKeys(userName: string): Promise<AccessKeyInput[]> {
    const keys: AccessKeyInput[] = [];
    let marker: string | undefined;
    do {
      const page = await this.gateway.listAccessKeys(userName, marker);
      for (const key of page.keys) {
        if (!key.AccessKeyId) continue;
        const lastUsedAt = await this.gateway.getAccessKeyLastUsed(key.AccessKeyId);
        keys.push({
          id: key.AccessKeyId,
          createdAt: key.CreateDate ?? new Date(0),
          status: key.Status === "Active" ? "Active" : "Inactive",
          lastUsedAt,
        });
      }
      marker = page.marker;
    } while (marker);
    return keys;
  }

  private async readMfaEnabled(userName: string): Promise<boolean> {
    try {
      return (await this.gateway.countMfaDevices(userName)) > 0;
    } catch (err: unknown) {
      if (isNoSuchEntity(err)) return false;
      throw err;
    }
  }

  private managedPolicies(
    attached: AttachedPolicy[] | undefined,
    documents: ReadonlyMap<string, string>,
  ): PolicyInput[] {
    return (attached ?? []).map((p) => {
      const name = p.PolicyName ?? p.PolicyArn ?? "";
      const text = p.PolicyArn ? documents.get(p.PolicyArn) : undefined;
      return {
        name,
        arn: p.PolicyArn,
        document: text === undefined ? undefined : this.decode(text, `managed policy '${name}'`),
      };
    });
  }

  private inlinePolicies(list: PolicyDetail[] | undefined, owner: string): PolicyInput[] {
    return (list ?? []).map((p) => {
      const name = p.PolicyName ?? "";
      return {
        name,
        document:
          p.PolicyDocument === undefined
            ? undefined
            : this.decode(p.PolicyDocument, `inline policy '${name}' of ${owner}`),
      };
    });
  }

  private decode(text: string, what: string): unknown {
    try {
      return decodePolicyDocument(text);
    } catch (err: unknown) {
      throw new CollectionError(`malformed document for ${what}: ${errorMessage(err)}`, {
        provider: this.provider,
        cause: err,
      });
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof CollectionError) throw err;
      const name = err instanceof Error ? err.name : "Error";
      throw new CollectionError(`${operation} failed: ${name}: ${errorMessage(err)}`, {
        provider: this.provider,
        cause: err,
      });
    }
  }
}

function defaultVersionDocument(policy: ManagedPolicyDetail): string | undefined {
  const versions = policy.PolicyVersionList ?? [];
  const version =
    versions.find((v) => v.IsDefaultVersion) ??
    versions.find((v) => v.VersionId !== undefined && v.VersionId === policy.DefaultVersionId);
  return version?.Document;
}
