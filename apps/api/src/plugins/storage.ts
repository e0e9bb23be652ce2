import { fileNameSchema, uploadFileSchema } from "@saasrelay/shared";
import { requireUser } from "../auth.js";
import { HttpError } from "../errors.js";
import type { Plugin } from "./types.js";

const UPLOAD_BODY_LIMIT_BYTES = 6 * 1024 * 1024;

export function userFileKey(userId: string, name: string): string {
  return `users/${userId}/${name}`;
}

function parseFileName(name: string): string {
  const parsed = fileNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new HttpError(400, "Invalid file name");
  }
  return parsed.data;
}

export const storagePlugin: Plugin = {
  name: "storage",
  version: "1.0.0",
  prefix: "/api/storage",

  async routes(app, { authenticate, storage }) {
    app.addHook("preHandler", authenticate);

    app.post("/files", { bodyLimit: UPLOAD_BODY_LIMIT_BYTES }, async (request, reply) => {
      const parsed = uploadFileSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const { name, contentType, contentBase64 } = parsed.data;
      const key = userFileKey(requireUser(request).id, name);
      const file = await storage.uploadFile(key, Buffer.from(contentBase64, "base64"), contentType);
      return reply.status(201).send(file);
    });

    app.get("/files", async (request) => ({
      files: await storage.listFiles(`users/${requireUser(request).id}/`),
    }));

    app.get<{ Params: { name: string } }>("/files/:name", async (request) => {
      const key = userFileKey(requireUser(request).id, parseFileName(request.params.name));
      const stored = await storage.downloadFile(key);
      if (!stored) {
        throw new HttpError(404, "File not found");
      }
      return { ...stored.file, contentBase64: stored.content.toString("base64") };
    });

    app.delete<{ Params: { name: string } }>("/files/:name", async (request) => {
      const key = userFileKey(requireUser(request).id, parseFileName(request.params.name));
      if (!(await storage.deleteFile(key))) {
        throw new HttpError(404, "File not found");
      }
      return { deleted: true };
    });
  },
};
