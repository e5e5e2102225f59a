import { loadAppConfig } from "../core/app-config.js";
import type { ContainerRuntime } from "../docker/docker.js";

import { LocalApp, type App, type AppKind } from "./app.js";

export type RecoveredAppInput = {
  root: string;
  name: string;
  appType: string;
  /** Why the on-disk config could not be used. */
  reason: string;
};

export interface AppKindDefinition {
  /** Value of the `com.ddev.platform` label carried by this kind's containers. */
  readonly platformLabel: string;
  /** Build an application from its on-disk config; throws when the config is missing or invalid. */
  initialize(root: string): App;
  recover(input: RecoveredAppInput): App;
}

export type AppKindTable = Readonly<Record<AppKind, AppKindDefinition>>;

export function localAppKind(runtime: ContainerRuntime): AppKindDefinition {
  return {
    platformLabel: "ddev",
    initialize: (root) =>
      new LocalApp(root, { state: "initialized", config: loadAppConfig(root) }, runtime),
    recover: ({ root, name, appType, reason }) =>
      new LocalApp(root, { state: "degraded", name, appType, reason }, runtime),
  };
}

/** Built once at startup and passed to discovery. */
export function createAppKinds(runtime: ContainerRuntime): AppKindTable {
  return {
    local: localAppKind(runtime),
  };
}
