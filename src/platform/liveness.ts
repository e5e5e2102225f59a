import type { ContainerRuntime } from "../docker/docker.js";
import { LABELS } from "../docker/labels.js";

/**
 * True when the engine lists any container carrying the platform label.
 * Only label presence is checked; the engine's default listing decides which states appear.
 */
export async function managedContainersRunning(runtime: ContainerRuntime): Promise<boolean> {
  const containers = await runtime.listContainers();
  return containers.some((container) => Object.hasOwn(container.labels, LABELS.platform));
}
