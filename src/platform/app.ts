/**
 * Application model.
 *
 * An application is either initialized from its `.ddev/config.yaml` or, when that
 * file is missing or unreadable, recovered from the labels of its web container so
 * that orphaned environments can still be listed and removed.
 */

import fs from "node:fs";

import { appUrl, DEFAULT_ROUTER_HTTP_PORT, type AppConfig } from "../core/app-config.js";
import { appConfigPath } from "../core/config-discovery.js";
import type { ContainerRuntime } from "../docker/docker.js";
import { LABELS, WEB_SERVICE } from "../docker/labels.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppKind = "local";

export const SITE_STATUS = {
  running: "running",
  stopped: "stopped",
  notFound: "not found",
  dirMissing: "app directory missing",
  configMissing: ".ddev/config.yaml missing",
} as const;

export type AppSource =
  | { state: "initialized"; config: AppConfig }
  | { state: "degraded"; name: string; appType: string; reason: string };

export interface App {
  readonly kind: AppKind;
  readonly source: AppSource;
  getName(): string;
  getType(): string;
  getURL(): string;
  getRoot(): string;
  getStatus(): Promise<string>;
}

// =============================================================================
// LOCAL APP
// =============================================================================

export class LocalApp implements App {
  readonly kind: AppKind = "local";

  constructor(
    private readonly root: string,
    readonly source: AppSource,
    private readonly runtime: ContainerRuntime,
  ) {}

  getName(): string {
    return this.source.state === "initialized" ? this.source.config.name : this.source.name;
  }

  getType(): string {
    return this.source.state === "initialized" ? this.source.config.type : this.source.appType;
  }

  getURL(): string {
    if (this.source.state === "initialized") {
      return appUrl(this.source.config);
    }
    return appUrl({ name: this.source.name, router_http_port: DEFAULT_ROUTER_HTTP_PORT });
  }

  getRoot(): string {
    return this.root;
  }

  async getStatus(): Promise<string> {
    if (!fs.existsSync(this.root)) {
      return `${SITE_STATUS.dirMissing}: ${this.root}`;
    }

    const configPath = appConfigPath(this.root);
    if (!fs.existsSync(configPath)) {
      return `${SITE_STATUS.configMissing}: ${configPath}`;
    }

    const [web] = await this.runtime.findContainersByLabels({
      [LABELS.siteName]: this.getName(),
      [LABELS.service]: WEB_SERVICE,
    });
    if (!web) {
      return SITE_STATUS.notFound;
    }

    return web.state === "running" ? SITE_STATUS.running : SITE_STATUS.stopped;
  }
}
