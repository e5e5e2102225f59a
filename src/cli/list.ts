import type { Command } from "commander";

import { discoverApps } from "../platform/registry.js";
import { renderAppTable, type AppRow } from "../platform/render.js";
import { getRouterStatus } from "../platform/router.js";

import type { CliContext, CliContextFactory, GlobalOptions } from "./context.js";

export const NO_APPS_MESSAGE = "There are no running ddev applications.";

export function registerListCommand(program: Command, createContext: CliContextFactory): void {
  program
    .command("list")
    .alias("ls")
    .description("List the ddev applications with containers on this host")
    .action(async (_opts: unknown, command: Command) => {
      await listCommand(createContext(command.optsWithGlobals<GlobalOptions>()));
    });
}

export async function listCommand(ctx: CliContext): Promise<void> {
  const result = await discoverApps(ctx);

  for (const error of result.errors) {
    ctx.err(`Warning: ${error.message}`);
  }

  if (result.apps.size === 0) {
    ctx.out(NO_APPS_MESSAGE);
    return;
  }

  const routerStatus = await getRouterStatus(ctx.runtime);

  for (const [kind, apps] of result.apps) {
    const rows: AppRow[] = [];
    for (const app of apps) {
      rows.push({ app, status: await app.getStatus() });
    }

    for (const line of renderAppTable(kind, rows, { color: ctx.color, routerStatus })) {
      ctx.out(line);
    }
  }
}
