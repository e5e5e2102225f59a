// Label keys binding runtime objects to applications.
// Every container of one application carries the same SITE_NAME value.

export const LABELS = {
  platform: "com.ddev.platform",
  siteName: "com.ddev.site-name",
  appRoot: "com.ddev.approot",
  appType: "com.ddev.app-type",
  service: "com.docker.compose.service",
  composeProject: "com.docker.compose.project",
} as const;

export const WEB_SERVICE = "web";

export type LabelSet = Record<string, string>;

export function labelFilters(labels: LabelSet): string[] {
  return Object.entries(labels).map(([key, value]) => `${key}=${value}`);
}

/** Compose project name of an application's volumes: "ddev" plus the lowercased site name. */
export function composeProjectName(siteName: string): string {
  return `ddev${siteName.toLowerCase()}`;
}
