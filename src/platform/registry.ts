import { AppRecoveryError, DockerError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import type { ContainerRuntime, ContainerSummary } from "../docker/docker.js";
import { LABELS, WEB_SERVICE } from "../docker/labels.js";

import type { App, AppKind } from "./app.js";
import type { AppKindDefinition } from "./kinds.js";

// =============================================================================
// TYPES
// =============================================================================

export type DiscoveryError = DockerError | AppRecoveryError;

export type DiscoveryResult<K extends string = AppKind> = {
  /** Applications per kind, in runtime query order. Kinds without applications have no entry. */
  apps: Map<K, App[]>;
  errors: DiscoveryError[];
};

export type DiscoveryDeps<K extends string = AppKind> = {
  runtime: ContainerRuntime;
  /** Kinds are queried in the table's declaration order. */
  kinds: Readonly<Record<K, AppKindDefinition>>;
  logger?: EventLogger;
};

// =============================================================================
// DISCOVERY
// =============================================================================

export async function discoverApps<K extends string = AppKind>(
  deps: DiscoveryDeps<K>,
): Promise<DiscoveryResult<K>> {
  const apps = new Map<K, App[]>();
  const errors: DiscoveryError[] = [];

  for (const kind in deps.kinds) {
    const definition = deps.kinds[kind];

    let containers: ContainerSummary[];
    try {
      containers = await deps.runtime.findContainersByLabels({
        [LABELS.platform]: definition.platformLabel,
        [LABELS.service]: WEB_SERVICE,
      });
    } catch (err) {
      const error =
        err instanceof DockerError
          ? err
          : new DockerError(`Failed to query ${kind} containers: ${formatErrorMessage(err)}`, err);
      errors.push(error);
      logEvent(deps.logger, "discovery.kind_failed", { kind, message: error.message });
      continue;
    }

    for (const container of containers) {
      const root = container.labels[LABELS.appRoot];
      if (!root) {
        logEvent(deps.logger, "discovery.container_skipped", {
          kind,
          container: container.name,
          reason: "missing_app_root",
        });
        continue;
      }

      const app = buildApp(definition, root, container, deps.logger);
      if (app instanceof AppRecoveryError) {
        errors.push(app);
        continue;
      }

      const list = apps.get(kind) ?? [];
      list.push(app);
      apps.set(kind, list);
    }
  }

  logEvent(deps.logger, "discovery.complete", {
    apps: [...apps.values()].reduce((total, list) => total + list.length, 0),
    errors: errors.length,
  });

  return { apps, errors };
}

export function findAppByName<K extends string>(
  result: DiscoveryResult<K>,
  name: string,
): App | undefined {
  for (const list of result.apps.values()) {
    const match = list.find((app) => app.getName() === name);
    if (match) return match;
  }
  return undefined;
}

// =============================================================================
// HELPERS
// =============================================================================

function buildApp(
  definition: AppKindDefinition,
  root: string,
  container: ContainerSummary,
  logger?: EventLogger,
): App | AppRecoveryError {
  try {
    return definition.initialize(root);
  } catch (initError) {
    const reason = formatErrorMessage(initError);
    const name = container.labels[LABELS.siteName];
    if (!name) {
      logEvent(logger, "discovery.recover_failed", { container: container.name, root, reason });
      return new AppRecoveryError(
        `Container ${container.name} has no readable config at ${root} and no site name label.`,
        container.name,
        initError,
      );
    }

    logEvent(logger, "discovery.app_degraded", { container: container.name, root, name, reason });
    return definition.recover({
      root,
      name,
      appType: container.labels[LABELS.appType] ?? "",
      reason,
    });
  }
}
