import type { Command } from "commander";

import { locateAppRoot } from "../core/config-discovery.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { LABELS } from "../docker/labels.js";
import type { App } from "../platform/app.js";
import { cleanupApp, type TeardownProgress } from "../platform/cleanup.js";
import { discoverApps, findAppByName } from "../platform/registry.js";

import type { CliContext, CliContextFactory, GlobalOptions } from "./context.js";

type RemovableApp = Pick<App, "getName">;

const PROGRESS_LABELS: Record<TeardownProgress["step"], string> = {
  stop: "Stopping container",
  remove: "Removing container",
  volume: "Removing volume",
};

export function registerRemoveCommand(program: Command, createContext: CliContextFactory): void {
  program
    .command("remove")
    .alias("rm")
    .description("Stop and remove an application's containers and volumes")
    .argument("[name]", "Application name (default: the application in the working directory)")
    .action(async (name: string | undefined, _opts: unknown, command: Command) => {
      await removeCommand(createContext(command.optsWithGlobals<GlobalOptions>()), name);
    });
}

export async function removeCommand(ctx: CliContext, name?: string): Promise<void> {
  const app = name ? await resolveByName(ctx, name) : resolveFromCwd(ctx);

  await cleanupApp(app, {
    runtime: ctx.runtime,
    router: ctx.router,
    logger: ctx.logger,
    onStep: (progress) => ctx.out(`${PROGRESS_LABELS[progress.step]}: ${progress.name}`),
  });

  ctx.out(`Successfully removed ${app.getName()}`);
}

// An application whose web container is gone is still removable by its site name label.
async function resolveByName(ctx: CliContext, name: string): Promise<RemovableApp> {
  const discovered = findAppByName(await discoverApps(ctx), name);
  if (discovered) return discovered;

  const leftovers = await ctx.runtime.findContainersByLabels({ [LABELS.siteName]: name });
  if (leftovers.length > 0) {
    return { getName: () => name };
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "No ddev application found.",
    message: `No application named ${name} was found.`,
    hint: "Run `ddev-lite list` to see the active applications.",
  });
}

function resolveFromCwd(ctx: CliContext): RemovableApp {
  const root = locateAppRoot(ctx.cwd);
  return ctx.kinds.local.initialize(root);
}
