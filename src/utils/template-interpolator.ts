// src/utils/template-interpolator.ts

/**
 * Variables available to the environment image template.
 */
export interface ImageTemplateContext {
  versionTag: string;
}

/**
 * Variables available to install commands.
 */
export interface InstallTemplateContext {
  extras: string;                      // "tests,docs"
  extrasSuffix: string;                // "[tests,docs]" or "" when there are none
  workdir: string;
}

/**
 * Replace {{variable}} placeholders in a template string.
 * Unknown variables are left as-is.
 */
export function interpolateTemplate(
  template: string,
  context: object
): string {
  const values = new Map<string, unknown>(Object.entries(context));
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = values.get(key);
    if (value === undefined || value === null) {
      return match;
    }
    return String(value);
  });
}

/**
 * Names of the {{placeholders}} a template uses, in order of first appearance.
 */
export function listPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(/\{\{(\w+)\}\}/g)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

export function buildInstallContext(extras: string[], workdir: string): InstallTemplateContext {
  const list = extras.join(',');
  return {
    extras: list,
    extrasSuffix: list ? `[${list}]` : '',
    workdir,
  };
}
