import type {
  SubscriptionStatus,
  TwoFactorMethod,
  TwoFactorVerificationMethod,
} from "@saasrelay/shared";

export interface Profile {
  id: string;
  email: string;
  fullName: string;
  passwordHash: string;
  phone: string | null;
  isAdmin: boolean;
  stripeCustomerId: string | null;
  twoFactorEnabled: boolean;
  twoFactorSecret: string | null;
  twoFactorMethod: TwoFactorMethod | null;
  backupCodes: string[];
  twoFactorEnabledAt: string | null;
  createdAt: string;
  updatedAt: string | null;
}

export interface Subscription {
  id: string;
  userId: string;
  stripeCustomerId: string;
  stripeSubscriptionId: string;
  status: SubscriptionStatus | string;
  currentPeriodStart: string;
  currentPeriodEnd: string;
  cancelAtPeriodEnd: boolean;
  createdAt: string;
  updatedAt: string | null;
}

export interface Campaign {
  id: string;
  name: string;
  subject: string;
  content: string;
  segment: string;
  status: "draft" | "scheduled" | "sent";
  scheduledAt: string | null;
  sentAt: string | null;
  totalRecipients: number;
  createdAt: string;
}

export interface UsageEvent {
  id: string;
  userId: string | null;
  eventType: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface DownloadLog {
  id: string;
  userId: string;
  imageName: string;
  tag: string;
  ipAddress: string | null;
  createdAt: string;
}

export interface WebhookEventLog {
  id: string;
  eventId: string;
  eventType: string;
  provider: string;
  data: Record<string, unknown>;
  processed: boolean;
  error: string | null;
  createdAt: string;
}

export interface TwoFactorLog {
  id: string;
  userId: string;
  method: TwoFactorVerificationMethod;
  success: boolean;
  ipAddress: string | null;
  createdAt: string;
}

export interface Tables {
  profiles: Profile;
  subscriptions: Subscription;
  campaigns: Campaign;
  usage_events: UsageEvent;
  download_logs: DownloadLog;
  webhook_events: WebhookEventLog;
  two_factor_logs: TwoFactorLog;
}

export type TableName = keyof Tables;

export type Row<T extends TableName> = Tables[T];

export type Filters<T extends TableName> = Partial<Row<T>>;

export type DatabaseData = { [K in TableName]: Array<Row<K>> };

export const tableColumns: { readonly [K in TableName]: ReadonlyArray<keyof Row<K> & string> } = {
  profiles: [
    "id",
    "email",
    "fullName",
    "passwordHash",
    "phone",
    "isAdmin",
    "stripeCustomerId",
    "twoFactorEnabled",
    "twoFactorSecret",
    "twoFactorMethod",
    "backupCodes",
    "twoFactorEnabledAt",
    "createdAt",
    "updatedAt",
  ],
  subscriptions: [
    "id",
    "userId",
    "stripeCustomerId",
    "stripeSubscriptionId",
    "status",
    "currentPeriodStart",
    "currentPeriodEnd",
    "cancelAtPeriodEnd",
    "createdAt",
    "updatedAt",
  ],
  campaigns: [
    "id",
    "name",
    "subject",
    "content",
    "segment",
    "status",
    "scheduledAt",
    "sentAt",
    "totalRecipients",
    "createdAt",
  ],
  usage_events: ["id", "userId", "eventType", "metadata", "createdAt"],
  download_logs: ["id", "userId", "imageName", "tag", "ipAddress", "createdAt"],
  webhook_events: ["id", "eventId", "eventType", "provider", "data", "processed", "error", "createdAt"],
  two_factor_logs: ["id", "userId", "method", "success", "ipAddress", "createdAt"],
};
