// Shared router signal.
// The router serves every application; it is brought down once no managed container remains.

import fs from "node:fs";

import { execa } from "execa";

import { DockerError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import type { ContainerRuntime } from "../docker/docker.js";
import { LABELS } from "../docker/labels.js";

import { managedContainersRunning } from "./liveness.js";

export const ROUTER_PROJECT = "ddev-router";

export type RouterStatus = "running" | "stopped" | "not running";

export interface RouterSignal {
  reconcile(): Promise<void>;
}

export class ComposeRouter implements RouterSignal {
  constructor(
    private readonly opts: {
      runtime: ContainerRuntime;
      composePath: string;
      logger?: EventLogger;
    },
  ) {}

  async reconcile(): Promise<void> {
    if (await managedContainersRunning(this.opts.runtime)) {
      logEvent(this.opts.logger, "router.keep");
      return;
    }

    if (!fs.existsSync(this.opts.composePath)) {
      logEvent(this.opts.logger, "router.skip", { compose_path: this.opts.composePath });
      return;
    }

    try {
      await execa("docker", [
        "compose",
        "-f",
        this.opts.composePath,
        "-p",
        ROUTER_PROJECT,
        "down",
        "-v",
      ]);
    } catch (err) {
      throw new DockerError(`Failed to stop the router: ${formatErrorMessage(err)}`, err);
    }

    logEvent(this.opts.logger, "router.stop", { compose_path: this.opts.composePath });
  }
}

export async function getRouterStatus(runtime: ContainerRuntime): Promise<RouterStatus> {
  const containers = await runtime.findContainersByLabels({
    [LABELS.composeProject]: ROUTER_PROJECT,
  });
  if (containers.length === 0) return "not running";
  return containers.some((container) => container.state === "running") ? "running" : "stopped";
}
