import { downloadRequestSchema } from "@saasrelay/shared";
import { requireUser } from "../auth.js";
import { HttpError } from "../errors.js";
import type { Plugin } from "./types.js";

export const dockerRegistryPlugin: Plugin = {
  name: "docker_registry",
  version: "1.0.0",
  prefix: "/api/docker",

  async routes(app, { authenticate, bus, config, services }) {
    const downloads = services.downloads;
    app.addHook("preHandler", authenticate);

    app.get("/images", async (request) => downloads.listImages(requireUser(request).id));

    app.post("/download-token", async (request, reply) => {
      const parsed = downloadRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const user = requireUser(request);
      const issued = await downloads.issue(user.id, parsed.data.imageName, parsed.data.tag, request.ip);
      await bus.publish("docker.download_requested", {
        userId: user.id,
        imageName: issued.imageName,
        tag: issued.tag,
      });
      return reply.send(issued);
    });

    app.get<{ Params: { token: string } }>("/download-token/:token", async (request) => {
      const data = await downloads.verify(request.params.token);
      if (!data || data.userId !== requireUser(request).id) {
        throw new HttpError(404, "Download token not found or expired");
      }
      return data;
    });

    app.get("/download-history", async (request) => ({
      downloads: await downloads.history(requireUser(request).id),
    }));

    app.get("/credentials", async () => ({
      registryUrl: config.dockerRegistryUrl,
      instructions: "Use the download token as your password",
    }));
  },
};
