import { resolveColorEnabled } from "../core/error-format.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import { loadSettings, type Settings } from "../core/settings.js";
import { DockerRuntime, type ContainerRuntime } from "../docker/docker.js";
import { createAppKinds, type AppKindTable } from "../platform/kinds.js";
import { ComposeRouter, type RouterSignal } from "../platform/router.js";

export type GlobalOptions = {
  debug?: boolean;
  color?: boolean;
};

export type CliContext = {
  settings: Settings;
  runtime: ContainerRuntime;
  kinds: AppKindTable;
  router: RouterSignal;
  logger?: EventLogger;
  cwd: string;
  color: boolean;
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliContextFactory = (opts: GlobalOptions) => CliContext;

export function createCliContext(opts: GlobalOptions = {}): CliContext {
  const settings = loadSettings();
  const runtime = new DockerRuntime();
  const logger = settings.eventLogPath ? new JsonlLogger(settings.eventLogPath) : undefined;

  return {
    settings,
    runtime,
    kinds: createAppKinds(runtime),
    router: new ComposeRouter({ runtime, composePath: settings.routerComposePath, logger }),
    logger,
    cwd: process.cwd(),
    color: !settings.noColor && resolveColorEnabled({ useColor: opts.color }),
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  };
}
