import { backupCodeSchema, disableTwoFactorSchema, twoFactorCodeSchema } from "@saasrelay/shared";
import { requireUser, verifyPassword } from "../auth.js";
import { HttpError } from "../errors.js";
import { TwoFactorError } from "../services/two-factor.js";
import type { Plugin } from "./types.js";

export const twoFactorPlugin: Plugin = {
  name: "two_factor",
  version: "1.0.0",
  prefix: "/api/2fa",

  async routes(app, { authenticate, bus, services }) {
    const twoFactor = services.twoFactor;
    app.addHook("preHandler", authenticate);

    app.post("/setup", async (request) => {
      const user = requireUser(request);
      if (user.twoFactorEnabled) {
        throw new HttpError(400, "2FA is already enabled");
      }
      return twoFactor.setup(user.id, user.email);
    });

    app.post("/enable", async (request, reply) => {
      const parsed = twoFactorCodeSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      try {
        await twoFactor.enable(user.id, parsed.data.code);
      } catch (error) {
        if (error instanceof TwoFactorError) {
          throw new HttpError(400, error.message);
        }
        throw error;
      }

      await bus.publish("2fa.enabled", { userId: user.id, email: user.email, method: "totp" });
      return reply.send({ message: "2FA enabled successfully" });
    });

    app.post("/verify", async (request, reply) => {
      const parsed = twoFactorCodeSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      if (!(await twoFactor.verifyTotp(requireUser(request).id, parsed.data.code, request.ip))) {
        throw new HttpError(401, "Invalid verification code");
      }
      return reply.send({ verified: true });
    });

    app.post("/verify-backup", async (request, reply) => {
      const parsed = backupCodeSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      if (!(await twoFactor.verifyBackupCode(user.id, parsed.data.backupCode, request.ip))) {
        throw new HttpError(401, "Invalid backup code");
      }
      const status = await twoFactor.status(user.id);
      return reply.send({ verified: true, backupCodesRemaining: status.backupCodesRemaining });
    });

    app.post("/disable", async (request, reply) => {
      const parsed = disableTwoFactorSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      if (!(await verifyPassword(parsed.data.password, user.passwordHash))) {
        throw new HttpError(401, "Invalid password");
      }

      await twoFactor.disable(user.id);
      await bus.publish("2fa.disabled", { userId: user.id, email: user.email });
      return reply.send({ message: "2FA disabled successfully" });
    });

    app.get("/status", async (request) => twoFactor.status(requireUser(request).id));
  },
};
