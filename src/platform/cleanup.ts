import { DockerError, TeardownError, type TeardownStep } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import type { ContainerRuntime, ContainerSummary } from "../docker/docker.js";
import { composeProjectName, LABELS } from "../docker/labels.js";

import type { App } from "./app.js";
import type { RouterSignal } from "./router.js";

// =============================================================================
// TYPES
// =============================================================================

/** Grace period before the engine kills a container on stop. */
export const STOP_TIMEOUT_SECONDS = 60;

const STOPPABLE_STATES = new Set(["running", "restarting", "paused"]);

export type TeardownProgress = {
  step: TeardownStep;
  name: string;
};

export type CleanupDeps = {
  runtime: ContainerRuntime;
  router: RouterSignal;
  logger?: EventLogger;
  onStep?: (progress: TeardownProgress) => void;
};

export type CleanupResult = {
  stopped: string[];
  removedContainers: string[];
  removedVolumes: string[];
};

// =============================================================================
// TEARDOWN
// =============================================================================

/**
 * Stop and remove every container labeled with the application's site name, then its
 * volumes, then signal the router. Works without the on-disk config.
 *
 * Fail-fast: the first failing step aborts the rest.
 */
export async function cleanupApp(
  app: Pick<App, "getName">,
  deps: CleanupDeps,
): Promise<CleanupResult> {
  const name = app.getName();
  const result: CleanupResult = { stopped: [], removedContainers: [], removedVolumes: [] };

  logEvent(deps.logger, "cleanup.start", { app: name });

  const containers = await deps.runtime.findContainersByLabels({ [LABELS.siteName]: name });

  for (const container of containers) {
    if (!STOPPABLE_STATES.has(container.state)) continue;

    deps.onStep?.({ step: "stop", name: container.name });
    await runContainerStep("stop", container, deps, name, () =>
      deps.runtime.stopContainer(container.id, STOP_TIMEOUT_SECONDS),
    );
    result.stopped.push(container.name);
    logEvent(deps.logger, "cleanup.container_stopped", { app: name, container: container.name });
  }

  for (const container of containers) {
    deps.onStep?.({ step: "remove", name: container.name });
    await runContainerStep("remove", container, deps, name, () =>
      deps.runtime.removeContainer(container.id, { removeVolumes: true, force: true }),
    );
    result.removedContainers.push(container.name);
    logEvent(deps.logger, "cleanup.container_removed", { app: name, container: container.name });
  }

  const project = composeProjectName(name);
  const volumes = await deps.runtime.listVolumes();
  for (const volume of volumes) {
    if (volume.labels[LABELS.composeProject] !== project) continue;

    deps.onStep?.({ step: "volume", name: volume.name });
    try {
      await deps.runtime.removeVolume(volume.name);
    } catch (err) {
      logEvent(deps.logger, "cleanup.failed", { app: name, step: "volume", target: volume.name });
      throw new TeardownError({
        step: "volume",
        target: { type: "volume", name: volume.name },
        cause: unwrapDockerError(err),
      });
    }
    result.removedVolumes.push(volume.name);
    logEvent(deps.logger, "cleanup.volume_removed", { app: name, volume: volume.name });
  }

  await deps.router.reconcile();

  logEvent(deps.logger, "cleanup.complete", {
    app: name,
    containers: result.removedContainers.length,
    volumes: result.removedVolumes.length,
  });
  return result;
}

// =============================================================================
// HELPERS
// =============================================================================

async function runContainerStep(
  step: "stop" | "remove",
  container: ContainerSummary,
  deps: CleanupDeps,
  app: string,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    logEvent(deps.logger, "cleanup.failed", { app, step, target: container.name });
    throw new TeardownError({
      step,
      target: { type: "container", name: container.name },
      cause: unwrapDockerError(err),
    });
  }
}

// The runtime adapter already prefixes its own context; keep the engine's message.
function unwrapDockerError(err: unknown): unknown {
  if (err instanceof DockerError && err.cause !== undefined) {
    return err.cause;
  }
  return err;
}
