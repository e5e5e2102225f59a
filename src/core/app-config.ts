import fs from "node:fs";

import { parse as parseYaml } from "yaml";
import { z, type ZodIssue } from "zod";

import { appConfigPath } from "./config-discovery.js";
import { AppConfigError } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const PortSchema = z.union([z.string().min(1), z.number().int().positive()]).transform(String);

export const AppConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    type: z.string().trim().min(1),
    docroot: z.string().default(""),
    router_http_port: PortSchema.default("80"),
  })
  .passthrough();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_ROUTER_HTTP_PORT = "80";

// =============================================================================
// LOADING
// =============================================================================

export function loadAppConfig(appRoot: string): AppConfig {
  const configPath = appConfigPath(appRoot);

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new AppConfigError(`Could not read ${configPath}.`, configPath, err);
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new AppConfigError(`${configPath} is not valid YAML.`, configPath, err);
  }

  const parsed = AppConfigSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new AppConfigError(
      `${configPath} is invalid: ${issues.join("; ")}`,
      configPath,
      parsed.error,
    );
  }

  return parsed.data;
}

export function appUrl(config: Pick<AppConfig, "name" | "router_http_port">): string {
  const port =
    config.router_http_port === DEFAULT_ROUTER_HTTP_PORT ? "" : `:${config.router_http_port}`;
  return `http://${config.name}.ddev.local${port}`;
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }

    return `${location}: ${issue.message}`;
  });
}
