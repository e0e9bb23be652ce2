import { z } from "zod";

const imageNameRegex = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/;
const imageTagRegex = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const fileNameRegex = /^[A-Za-z0-9][A-Za-z0-9._-]{0,199}$/;

export const registerSchema = z.object({
  email: z.string().email(),
  password: z.string().min(8).max(200),
  fullName: z.string().min(1).max(200),
});

export const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export const twoFactorLoginSchema = z.object({
  userId: z.string().min(1),
  code: z.string().min(6).max(20),
});

export const updateProfileSchema = z.object({
  fullName: z.string().min(1).max(200).optional(),
});

export const twoFactorCodeSchema = z.object({
  code: z.string().regex(/^\d{6}$/),
});

export const disableTwoFactorSchema = z.object({
  password: z.string().min(1),
});

export const backupCodeSchema = z.object({
  backupCode: z.string().min(1).max(40),
});

export const checkoutSessionSchema = z.object({
  priceId: z.string().min(1),
  successUrl: z.string().url(),
  cancelUrl: z.string().url(),
  mode: z.enum(["subscription", "payment"]).default("subscription"),
});

export const billingPortalSchema = z.object({
  returnUrl: z.string().url(),
});

export const cancelSubscriptionSchema = z.object({
  immediately: z.boolean().default(false),
});

export const downloadRequestSchema = z.object({
  imageName: z.string().regex(imageNameRegex),
  tag: z.string().regex(imageTagRegex).default("latest"),
});

export const fileNameSchema = z.string().regex(fileNameRegex);

export const uploadFileSchema = z.object({
  name: fileNameSchema,
  contentType: z.string().min(3).max(200).default("application/octet-stream"),
  contentBase64: z.string().max(4 * 1024 * 1024),
});

export const webhookEventSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    created: z.number().int().optional(),
    data: z
      .object({
        object: z.record(z.unknown()),
      })
      .default({ object: {} }),
  })
  .passthrough();

export type WebhookEvent = z.infer<typeof webhookEventSchema>;

export const subscriptionObjectSchema = z.object({
  id: z.string().min(1),
  customer: z.string().min(1),
  status: z.string().min(1),
  current_period_start: z.number().int(),
  current_period_end: z.number().int(),
  cancel_at_period_end: z.boolean().default(false),
});

export const paymentIntentObjectSchema = z.object({
  id: z.string().min(1),
  customer: z.string().nullable().optional(),
  amount: z.number().int(),
  currency: z.string(),
  client_secret: z.string().nullable().optional(),
  last_payment_error: z
    .object({
      message: z.string().optional(),
    })
    .nullable()
    .optional(),
});

export const invoiceObjectSchema = z.object({
  id: z.string().min(1),
  customer: z.string().nullable().optional(),
  amount_paid: z.number().int().default(0),
  amount_due: z.number().int().default(0),
  currency: z.string().default("usd"),
  period_start: z.number().int().nullable().optional(),
  period_end: z.number().int().nullable().optional(),
  attempt_count: z.number().int().default(0),
  next_payment_attempt: z.number().int().nullable().optional(),
});
