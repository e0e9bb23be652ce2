import { analyticsPlugin } from "./analytics.js";
import { authPlugin } from "./auth.js";
import { dockerRegistryPlugin } from "./docker-registry.js";
import { notificationsPlugin } from "./notifications.js";
import { storagePlugin } from "./storage.js";
import { subscriptionsPlugin } from "./subscriptions.js";
import { twoFactorPlugin } from "./two-factor.js";
import type { Plugin } from "./types.js";
import { webhooksPlugin } from "./webhooks.js";

export { PluginRegistry } from "./registry.js";
export type { Plugin, PluginContext, PluginMetadata, PluginServices, Unsubscribe } from "./types.js";

export function builtinPlugins(): Plugin[] {
  return [
    authPlugin,
    twoFactorPlugin,
    webhooksPlugin,
    subscriptionsPlugin,
    dockerRegistryPlugin,
    storagePlugin,
    analyticsPlugin,
    notificationsPlugin,
  ];
}
