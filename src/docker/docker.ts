import Docker from "dockerode";

import { DockerError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";

import { labelFilters, type LabelSet } from "./labels.js";

// =============================================================================
// TYPES
// =============================================================================

export type ContainerSummary = {
  id: string;
  /** First container name without the leading slash. */
  name: string;
  names: string[];
  state: string;
  labels: LabelSet;
};

export type VolumeSummary = {
  name: string;
  labels: LabelSet;
};

export type RemoveContainerOptions = {
  removeVolumes: boolean;
  force: boolean;
};

export type ListContainersOptions = {
  /** Include stopped containers. The engine lists running containers only by default. */
  all?: boolean;
};

/** The container runtime operations discovery and teardown consume. */
export interface ContainerRuntime {
  findContainersByLabels(labels: LabelSet): Promise<ContainerSummary[]>;
  listContainers(opts?: ListContainersOptions): Promise<ContainerSummary[]>;
  listVolumes(): Promise<VolumeSummary[]>;
  stopContainer(id: string, timeoutSeconds: number): Promise<void>;
  removeContainer(id: string, opts: RemoveContainerOptions): Promise<void>;
  removeVolume(name: string): Promise<void>;
}

type RawContainerInfo = {
  Id: string;
  Names?: string[];
  State?: string;
  Labels?: Record<string, string> | null;
};

type RawVolumeInfo = {
  Name: string;
  Labels?: Record<string, string> | null;
};

/** The subset of the dockerode client used here. */
export type DockerApi = {
  listContainers(options: {
    all: boolean;
    filters?: Record<string, string[]>;
  }): Promise<RawContainerInfo[]>;
  listVolumes(): Promise<{ Volumes: RawVolumeInfo[] | null }>;
  getContainer(id: string): {
    stop(options: { t: number }): Promise<unknown>;
    remove(options: { v: boolean; force: boolean }): Promise<unknown>;
  };
  getVolume(name: string): {
    remove(): Promise<unknown>;
  };
};

export function dockerClient(): Docker {
  return new Docker();
}

// =============================================================================
// DOCKER RUNTIME
// =============================================================================

export class DockerRuntime implements ContainerRuntime {
  constructor(private readonly docker: DockerApi = dockerClient()) {}

  async findContainersByLabels(labels: LabelSet): Promise<ContainerSummary[]> {
    try {
      const containers = await this.docker.listContainers({
        all: true,
        filters: { label: labelFilters(labels) },
      });
      return containers.map(toContainerSummary);
    } catch (err) {
      throw new DockerError(`Failed to list containers: ${formatErrorMessage(err)}`, err);
    }
  }

  async listContainers(opts: ListContainersOptions = {}): Promise<ContainerSummary[]> {
    try {
      const containers = await this.docker.listContainers({ all: opts.all ?? false });
      return containers.map(toContainerSummary);
    } catch (err) {
      throw new DockerError(`Failed to list containers: ${formatErrorMessage(err)}`, err);
    }
  }

  async listVolumes(): Promise<VolumeSummary[]> {
    try {
      const res = await this.docker.listVolumes();
      return (res.Volumes ?? []).map((volume) => ({
        name: volume.Name,
        labels: volume.Labels ?? {},
      }));
    } catch (err) {
      throw new DockerError(`Failed to list volumes: ${formatErrorMessage(err)}`, err);
    }
  }

  async stopContainer(id: string, timeoutSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(id).stop({ t: timeoutSeconds });
    } catch (err) {
      throw new DockerError(`Failed to stop container ${id}: ${formatErrorMessage(err)}`, err);
    }
  }

  async removeContainer(id: string, opts: RemoveContainerOptions): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ v: opts.removeVolumes, force: opts.force });
    } catch (err) {
      throw new DockerError(`Failed to remove container ${id}: ${formatErrorMessage(err)}`, err);
    }
  }

  async removeVolume(name: string): Promise<void> {
    try {
      await this.docker.getVolume(name).remove();
    } catch (err) {
      throw new DockerError(`Failed to remove volume ${name}: ${formatErrorMessage(err)}`, err);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toContainerSummary(info: RawContainerInfo): ContainerSummary {
  const names = info.Names ?? [];
  return {
    id: info.Id,
    name: containerName(names, info.Id),
    names,
    state: info.State ?? "unknown",
    labels: info.Labels ?? {},
  };
}

export function containerName(names: string[], fallback: string): string {
  const first = names[0];
  if (!first) return fallback;
  return first.startsWith("/") ? first.slice(1) : first;
}
