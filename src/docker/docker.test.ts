import { describe, expect, it } from "vitest";

import { DockerError } from "../core/errors.js";

import { DockerRuntime, containerName, type DockerApi } from "./docker.js";

type RecordedCall =
  | { op: "listContainers"; options: { all: boolean; filters?: Record<string, string[]> } }
  | { op: "listVolumes" }
  | { op: "stop"; id: string; options: { t: number } }
  | { op: "remove"; id: string; options: { v: boolean; force: boolean } }
  | { op: "removeVolume"; name: string };

class RecordingDocker implements DockerApi {
  readonly calls: RecordedCall[] = [];
  failWith: Error | null = null;

  constructor(
    private readonly containers: Awaited<ReturnType<DockerApi["listContainers"]>> = [],
    private readonly volumes: Awaited<ReturnType<DockerApi["listVolumes"]>> = { Volumes: [] },
  ) {}

  async listContainers(options: {
    all: boolean;
    filters?: Record<string, string[]>;
  }): ReturnType<DockerApi["listContainers"]> {
    this.calls.push({ op: "listContainers", options });
    if (this.failWith) throw this.failWith;
    return this.containers;
  }

  async listVolumes(): ReturnType<DockerApi["listVolumes"]> {
    this.calls.push({ op: "listVolumes" });
    if (this.failWith) throw this.failWith;
    return this.volumes;
  }

  getContainer(id: string): ReturnType<DockerApi["getContainer"]> {
    return {
      stop: async (options) => {
        this.calls.push({ op: "stop", id, options });
        if (this.failWith) throw this.failWith;
      },
      remove: async (options) => {
        this.calls.push({ op: "remove", id, options });
        if (this.failWith) throw this.failWith;
      },
    };
  }

  getVolume(name: string): ReturnType<DockerApi["getVolume"]> {
    return {
      remove: async () => {
        this.calls.push({ op: "removeVolume", name });
        if (this.failWith) throw this.failWith;
      },
    };
  }
}

describe("DockerRuntime", () => {
  it("filters containers by label across every state", async () => {
    const docker = new RecordingDocker([
      {
        Id: "c1",
        Names: ["/ddev-site1-web"],
        State: "running",
        Labels: { "com.ddev.site-name": "site1" },
      },
    ]);
    const runtime = new DockerRuntime(docker);

    const containers = await runtime.findContainersByLabels({
      "com.ddev.platform": "ddev",
      "com.docker.compose.service": "web",
    });

    expect(docker.calls).toEqual([
      {
        op: "listContainers",
        options: {
          all: true,
          filters: { label: ["com.ddev.platform=ddev", "com.docker.compose.service=web"] },
        },
      },
    ]);
    expect(containers).toEqual([
      {
        id: "c1",
        name: "ddev-site1-web",
        names: ["/ddev-site1-web"],
        state: "running",
        labels: { "com.ddev.site-name": "site1" },
      },
    ]);
  });

  it("lists running containers by default and fills missing fields", async () => {
    const docker = new RecordingDocker([{ Id: "c2", Labels: null }]);
    const runtime = new DockerRuntime(docker);

    const containers = await runtime.listContainers();

    expect(docker.calls).toEqual([{ op: "listContainers", options: { all: false } }]);
    expect(containers).toEqual([
      { id: "c2", name: "c2", names: [], state: "unknown", labels: {} },
    ]);
  });

  it("treats a null volume list as empty", async () => {
    const runtime = new DockerRuntime(new RecordingDocker([], { Volumes: null }));

    await expect(runtime.listVolumes()).resolves.toEqual([]);
  });

  it("maps volume labels", async () => {
    const runtime = new DockerRuntime(
      new RecordingDocker([], {
        Volumes: [
          { Name: "ddevsite1_data", Labels: { "com.docker.compose.project": "ddevsite1" } },
          { Name: "loose", Labels: null },
        ],
      }),
    );

    await expect(runtime.listVolumes()).resolves.toEqual([
      { name: "ddevsite1_data", labels: { "com.docker.compose.project": "ddevsite1" } },
      { name: "loose", labels: {} },
    ]);
  });

  it("passes the grace period and removal flags through", async () => {
    const docker = new RecordingDocker();
    const runtime = new DockerRuntime(docker);

    await runtime.stopContainer("c1", 60);
    await runtime.removeContainer("c1", { removeVolumes: true, force: true });
    await runtime.removeVolume("ddevsite1_data");

    expect(docker.calls).toEqual([
      { op: "stop", id: "c1", options: { t: 60 } },
      { op: "remove", id: "c1", options: { v: true, force: true } },
      { op: "removeVolume", name: "ddevsite1_data" },
    ]);
  });

  it("wraps engine failures in DockerError", async () => {
    const docker = new RecordingDocker();
    docker.failWith = new Error("connect ENOENT /var/run/docker.sock");
    const runtime = new DockerRuntime(docker);

    await expect(runtime.listContainers()).rejects.toBeInstanceOf(DockerError);
    await expect(runtime.stopContainer("c1", 60)).rejects.toThrow(
      "Failed to stop container c1: connect ENOENT /var/run/docker.sock",
    );
  });
});

describe("containerName", () => {
  it("strips the leading slash from the first name", () => {
    expect(containerName(["/ddev-site1-db", "/alias"], "id")).toBe("ddev-site1-db");
    expect(containerName([], "abc123")).toBe("abc123");
  });
});
