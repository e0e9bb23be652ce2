import { afterEach, describe, expect, it } from "vitest";
import type { Plugin } from "../src/plugins/index.js";
import { authHeader, buildTestApp, registerUser, type TestApp } from "./helpers.js";

let ctx: TestApp;

afterEach(async () => {
  await ctx.app.close();
});

describe("plugin selection", () => {
  it("mounts only the enabled plugins and skips unknown names", async () => {
    ctx = await buildTestApp({ ENABLED_PLUGINS: "auth, storage, billing" });
    const { token } = await registerUser(ctx.app);

    const storage = await ctx.app.inject({ method: "GET", url: "/api/storage/files", headers: authHeader(token) });
    expect(storage.statusCode).toBe(200);

    const docker = await ctx.app.inject({ method: "GET", url: "/api/docker/images", headers: authHeader(token) });
    expect(docker.statusCode).toBe(404);

    const enabled = ctx.app.pluginRegistry.list().filter((plugin) => plugin.enabled);
    expect(enabled.map((plugin) => plugin.name)).toEqual(["auth", "storage"]);
    expect(ctx.app.pluginRegistry.get("docker_registry")).toBeNull();
  });

  it("leaves analytics and notifications listeners out when they are disabled", async () => {
    ctx = await buildTestApp({ ENABLED_PLUGINS: "auth" });
    await registerUser(ctx.app);

    expect(ctx.email.sent).toEqual([]);
    expect(await ctx.app.platform.db.getAll("usage_events")).toEqual([]);
    expect(ctx.app.platform.bus.listenerCount("user.registered")).toBe(0);
  });
});

describe("plugin lifecycle", () => {
  function lifecyclePlugin(log: string[]): Plugin {
    return {
      name: "analytics",
      version: "2.0.0",
      async initialize() {
        log.push("initialize");
      },
      registerEventListeners(bus) {
        return [
          bus.subscribe("invoice.paid", () => {
            log.push("invoice.paid");
          }),
        ];
      },
      async shutdown() {
        log.push("shutdown");
      },
    };
  }

  const brokenPlugin: Plugin = {
    name: "storage",
    version: "1.0.0",
    prefix: "/api/storage",
    async initialize() {
      throw new Error("bucket unavailable");
    },
    async routes(app) {
      app.get("/files", async () => ({ files: [] }));
    },
  };

  it("skips a plugin whose initialize fails and keeps loading the rest", async () => {
    const log: string[] = [];
    ctx = await buildTestApp({}, { plugins: [brokenPlugin, lifecyclePlugin(log)] });

    const response = await ctx.app.inject({ method: "GET", url: "/api/storage/files" });
    expect(response.statusCode).toBe(404);

    expect(ctx.app.pluginRegistry.list()).toEqual([
      { name: "storage", version: "1.0.0", enabled: false },
      { name: "analytics", version: "2.0.0", enabled: true },
    ]);
    expect(log).toEqual(["initialize"]);
  });

  it("re-subscribes listeners once on reload", async () => {
    const log: string[] = [];
    ctx = await buildTestApp({}, { plugins: [lifecyclePlugin(log)] });

    expect(await ctx.app.pluginRegistry.reload("analytics")).toBe(true);
    expect(await ctx.app.pluginRegistry.reload("storage")).toBe(false);
    expect(ctx.app.platform.bus.listenerCount("invoice.paid")).toBe(1);

    await ctx.app.platform.bus.publish("invoice.paid", { userId: "u1" });
    expect(log).toEqual(["initialize", "shutdown", "initialize", "invoice.paid"]);
  });

  it("shuts plugins down and drops their listeners when the app closes", async () => {
    const log: string[] = [];
    ctx = await buildTestApp({}, { plugins: [lifecyclePlugin(log)] });
    const bus = ctx.app.platform.bus;

    await ctx.app.pluginRegistry.shutdownAll();
    expect(bus.listenerCount("invoice.paid")).toBe(0);
    expect(ctx.app.pluginRegistry.list()).toEqual([{ name: "analytics", version: "2.0.0", enabled: false }]);
    expect(log).toEqual(["initialize", "shutdown"]);
  });
});
