import { randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";

export interface EmailMessage {
  to: string[];
  subject: string;
  text: string;
  html?: string;
  from?: string;
  tags?: string[];
}

export interface EmailResult {
  success: boolean;
  provider: string;
  messageId: string | null;
  error?: string;
}

export interface BulkEmailResult {
  total: number;
  successful: number;
  failed: number;
  results: EmailResult[];
}

export interface EmailProvider {
  readonly name: string;
  sendEmail(message: EmailMessage): Promise<EmailResult>;
  sendBulk(messages: EmailMessage[]): Promise<BulkEmailResult>;
  sendTemplate(to: string[], templateName: string, variables: Record<string, string>): Promise<EmailResult>;
}

const templateSchema = z.object({
  subject: z.string(),
  text: z.string(),
  html: z.string().optional(),
});

export type EmailTemplate = z.infer<typeof templateSchema>;

const defaultTemplatesUrl = new URL("../../templates/email-templates.json", import.meta.url);

export function loadEmailTemplates(url: URL = defaultTemplatesUrl): Map<string, EmailTemplate> {
  const parsed = z.record(templateSchema).parse(JSON.parse(readFileSync(url, "utf8")));
  return new Map(Object.entries(parsed));
}

/** Substitutes `${name}` placeholders; unknown placeholders are left in place. */
export function renderTemplate(template: EmailTemplate, variables: Record<string, string>): EmailTemplate {
  const fill = (source: string) =>
    source.replace(/\$\{(\w+)\}/g, (placeholder, name: string) => variables[name] ?? placeholder);
  return {
    subject: fill(template.subject),
    text: fill(template.text),
    html: template.html === undefined ? undefined : fill(template.html),
  };
}

/** Logs messages instead of delivering them, and keeps them for inspection. */
export class ConsoleEmailProvider implements EmailProvider {
  readonly name = "console";
  readonly sent: Array<EmailMessage & { messageId: string }> = [];
  private readonly logger: Logger;

  constructor(
    private readonly from: string,
    logger: Logger,
    private readonly templates: Map<string, EmailTemplate> = loadEmailTemplates(),
  ) {
    this.logger = logger.child({ component: "email" });
  }

  async sendEmail(message: EmailMessage): Promise<EmailResult> {
    const messageId = `console-${randomUUID()}`;
    const from = message.from ?? this.from;
    this.sent.push({ ...message, from, messageId });
    this.logger.info({ to: message.to, from, subject: message.subject, messageId }, "Email sent");
    return { success: true, provider: this.name, messageId };
  }

  async sendBulk(messages: EmailMessage[]): Promise<BulkEmailResult> {
    const results: EmailResult[] = [];
    for (const message of messages) {
      results.push(await this.sendEmail(message));
    }
    const successful = results.filter((result) => result.success).length;
    return { total: messages.length, successful, failed: messages.length - successful, results };
  }

  async sendTemplate(to: string[], templateName: string, variables: Record<string, string>): Promise<EmailResult> {
    const template = this.templates.get(templateName);
    if (!template) {
      this.logger.error({ templateName }, "Email template not found");
      return { success: false, provider: this.name, messageId: null, error: `Template not found: ${templateName}` };
    }
    return this.sendEmail({ to, ...renderTemplate(template, variables) });
  }
}

export function createEmailProvider(email: AppConfig["email"], logger: Logger): EmailProvider {
  switch (email.provider) {
    case "console":
      return new ConsoleEmailProvider(email.from, logger);
    default:
      throw new Error(`Unknown email provider: ${String(email.provider)}`);
  }
}
