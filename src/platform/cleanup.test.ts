import { describe, expect, it } from "vitest";

import { DockerError, TeardownError } from "../core/errors.js";

import { FakeRouter, FakeRuntime, siteContainer, type RuntimeCall } from "./__tests__/fakes.js";
import { cleanupApp, STOP_TIMEOUT_SECONDS, type TeardownProgress } from "./cleanup.js";

// =============================================================================
// HELPERS
// =============================================================================

function site1Runtime(): FakeRuntime {
  return new FakeRuntime({
    containers: [
      siteContainer({ id: "web1", site: "site1", service: "web", state: "running" }),
      siteContainer({ id: "db1", site: "site1", service: "db", state: "exited" }),
      siteContainer({ id: "web2", site: "site2", service: "web", state: "running" }),
    ],
    volumes: [
      { name: "ddevsite1_data", labels: { "com.docker.compose.project": "ddevsite1" } },
      { name: "ddevsite2_data", labels: { "com.docker.compose.project": "ddevsite2" } },
      { name: "scratch", labels: {} },
    ],
  });
}

const site1 = { getName: () => "site1" };

const REMOVE_OPTS = { removeVolumes: true, force: true };

// =============================================================================
// TESTS
// =============================================================================

describe("cleanupApp", () => {
  it("stops, removes containers, removes volumes, then signals the router", async () => {
    const runtime = site1Runtime();
    let callsAtReconcile = -1;
    const router = new FakeRouter(() => {
      callsAtReconcile = runtime.calls.length;
    });

    const result = await cleanupApp(site1, { runtime, router });

    const expected: RuntimeCall[] = [
      { op: "find", labels: { "com.ddev.site-name": "site1" } },
      { op: "stop", id: "web1", timeout: STOP_TIMEOUT_SECONDS },
      { op: "remove", id: "web1", opts: REMOVE_OPTS },
      { op: "remove", id: "db1", opts: REMOVE_OPTS },
      { op: "listVolumes" },
      { op: "removeVolume", name: "ddevsite1_data" },
    ];
    expect(runtime.calls).toEqual(expected);
    expect(router.reconcileCalls).toBe(1);
    expect(callsAtReconcile).toBe(expected.length);
    expect(result).toEqual({
      stopped: ["ddev-site1-web"],
      removedContainers: ["ddev-site1-web", "ddev-site1-db"],
      removedVolumes: ["ddevsite1_data"],
    });
    expect(runtime.containers.map((c) => c.id)).toEqual(["web2"]);
  });

  it("stops restarting and paused containers with a 60 second grace period", async () => {
    const runtime = new FakeRuntime({
      containers: [
        siteContainer({ id: "a", site: "site1", service: "web", state: "restarting" }),
        siteContainer({ id: "b", site: "site1", service: "db", state: "paused" }),
        siteContainer({ id: "c", site: "site1", service: "dba", state: "created" }),
      ],
    });

    await cleanupApp(site1, { runtime, router: new FakeRouter() });

    const stops = runtime.calls.filter((call) => call.op === "stop");
    expect(stops).toEqual([
      { op: "stop", id: "a", timeout: 60 },
      { op: "stop", id: "b", timeout: 60 },
    ]);
  });

  it("matches volumes by the lowercased compose project name", async () => {
    const runtime = new FakeRuntime({
      volumes: [
        { name: "ddevmysite_db", labels: { "com.docker.compose.project": "ddevmysite" } },
        { name: "ddevMySite_db", labels: { "com.docker.compose.project": "ddevMySite" } },
      ],
    });

    const result = await cleanupApp({ getName: () => "MySite" }, { runtime, router: new FakeRouter() });

    expect(result.removedVolumes).toEqual(["ddevmysite_db"]);
  });

  it("reports progress in teardown order", async () => {
    const runtime = site1Runtime();
    const steps: TeardownProgress[] = [];

    await cleanupApp(site1, {
      runtime,
      router: new FakeRouter(),
      onStep: (progress) => steps.push(progress),
    });

    expect(steps).toEqual([
      { step: "stop", name: "ddev-site1-web" },
      { step: "remove", name: "ddev-site1-web" },
      { step: "remove", name: "ddev-site1-db" },
      { step: "volume", name: "ddevsite1_data" },
    ]);
  });

  it("aborts everything after a failed stop", async () => {
    const runtime = site1Runtime();
    runtime.failOn("stop", new Error("timeout exceeded"), "web1");
    const router = new FakeRouter();

    const error = await cleanupApp(site1, { runtime, router }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TeardownError);
    const teardown = error as TeardownError;
    expect(teardown.step).toBe("stop");
    expect(teardown.target).toEqual({ type: "container", name: "ddev-site1-web" });
    expect(teardown.message).toBe("Could not stop container ddev-site1-web: timeout exceeded");
    expect(runtime.calls.map((call) => call.op)).toEqual(["find", "stop"]);
    expect(router.reconcileCalls).toBe(0);
  });

  it("does not touch volumes when a container removal fails", async () => {
    const runtime = site1Runtime();
    runtime.failOn("remove", new DockerError("Failed to remove container db1: in use", new Error("in use")), "db1");

    const error = await cleanupApp(site1, { runtime, router: new FakeRouter() }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(TeardownError);
    expect((error as TeardownError).message).toBe("Could not remove container ddev-site1-db: in use");
    expect(runtime.calls.map((call) => call.op)).toEqual(["find", "stop", "remove", "remove"]);
  });

  it("names the volume that could not be removed", async () => {
    const runtime = site1Runtime();
    runtime.failOn("removeVolume", new Error("volume is in use"));
    const router = new FakeRouter();

    const error = await cleanupApp(site1, { runtime, router }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TeardownError);
    expect((error as TeardownError).target).toEqual({ type: "volume", name: "ddevsite1_data" });
    expect(router.reconcileCalls).toBe(0);
  });

  it("surfaces runtime query failures unchanged", async () => {
    const runtime = site1Runtime();
    runtime.failOn("find", new DockerError("Failed to list containers: refused"));

    await expect(cleanupApp(site1, { runtime, router: new FakeRouter() })).rejects.toThrow(
      "Failed to list containers: refused",
    );
    expect(runtime.calls.map((call) => call.op)).toEqual(["find"]);
  });

  it("surfaces router failures to the caller", async () => {
    const runtime = site1Runtime();
    const router = new FakeRouter();
    router.error = new DockerError("Failed to stop the router: exit 1");

    await expect(cleanupApp(site1, { runtime, router })).rejects.toThrow(
      "Failed to stop the router: exit 1",
    );
    expect(runtime.volumes.map((v) => v.name)).toEqual(["ddevsite2_data", "scratch"]);
  });
});
