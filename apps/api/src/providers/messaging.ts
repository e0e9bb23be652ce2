import { randomUUID } from "node:crypto";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";

export interface SmsResult {
  success: boolean;
  messageId: string;
  to: string;
  status: "delivered" | "failed";
  sentAt: string;
}

export interface SmsProvider {
  readonly name: string;
  sendSms(to: string, message: string, from?: string): Promise<SmsResult>;
  sendVerificationCode(to: string, code: string, template?: string): Promise<SmsResult>;
}

export interface PushMessage {
  title: string;
  body: string;
  data?: Record<string, string>;
  url?: string;
}

export interface PushResult {
  success: boolean;
  notificationId: string;
  recipients: number;
}

export interface PushNotificationProvider {
  readonly name: string;
  sendNotification(userId: string, message: PushMessage): Promise<PushResult>;
  subscribeDevice(userId: string, deviceToken: string, platform: string): Promise<boolean>;
  unsubscribeDevice(deviceToken: string): Promise<boolean>;
}

export class ConsoleSmsProvider implements SmsProvider {
  readonly name = "console";
  readonly sent: Array<{ to: string; from: string; message: string; messageId: string }> = [];
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "sms" });
  }

  async sendSms(to: string, message: string, from = "console"): Promise<SmsResult> {
    const messageId = randomUUID();
    this.sent.push({ to, from, message, messageId });
    this.logger.info({ to, from, messageId }, "SMS sent");
    return { success: true, messageId, to, status: "delivered", sentAt: new Date().toISOString() };
  }

  async sendVerificationCode(to: string, code: string, template?: string): Promise<SmsResult> {
    const message = template ? template.replace("{code}", code) : `Your verification code is: ${code}`;
    return this.sendSms(to, message);
  }
}

interface DeviceRegistration {
  userId: string;
  platform: string;
}

/** Logs notifications and keeps device registrations in memory. */
export class ConsolePushProvider implements PushNotificationProvider {
  readonly name = "console";
  readonly sent: Array<{ userId: string; message: PushMessage; notificationId: string }> = [];
  private readonly devices = new Map<string, DeviceRegistration>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "push" });
  }

  devicesFor(userId: string): string[] {
    return [...this.devices.entries()].filter(([, device]) => device.userId === userId).map(([token]) => token);
  }

  async sendNotification(userId: string, message: PushMessage): Promise<PushResult> {
    const notificationId = randomUUID();
    const recipients = this.devicesFor(userId).length;
    this.sent.push({ userId, message, notificationId });
    this.logger.info({ userId, title: message.title, recipients, notificationId }, "Push notification sent");
    return { success: true, notificationId, recipients };
  }

  async subscribeDevice(userId: string, deviceToken: string, platform: string): Promise<boolean> {
    this.devices.set(deviceToken, { userId, platform });
    return true;
  }

  async unsubscribeDevice(deviceToken: string): Promise<boolean> {
    return this.devices.delete(deviceToken);
  }
}

export function createSmsProvider(sms: AppConfig["sms"], logger: Logger): SmsProvider {
  switch (sms.provider) {
    case "console":
      return new ConsoleSmsProvider(logger);
    default:
      throw new Error(`Unknown sms provider: ${String(sms.provider)}`);
  }
}

export function createPushProvider(push: AppConfig["push"], logger: Logger): PushNotificationProvider {
  switch (push.provider) {
    case "console":
      return new ConsolePushProvider(logger);
    default:
      throw new Error(`Unknown push notification provider: ${String(push.provider)}`);
  }
}
