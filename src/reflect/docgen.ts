import type { TypeRegistry } from "./registry";
import type { TypeInfo } from "./descriptors";

export interface MarkdownOptions {
  /** Adds a "Generated:" line; omitted by default so output is stable. */
  timestamp?: Date;
}

/**
 * Generate a markdown class reference from a registry.
 */
export function generateMarkdown(registry: TypeRegistry, options: MarkdownOptions = {}): string {
  const infos = registry.initializeAll();
  const lines: string[] = [];

  lines.push("# Reflective Type Reference\n");
  if (options.timestamp) {
    lines.push(`Generated: ${options.timestamp.toISOString()}\n`);
  }
  lines.push(`Total types: ${infos.length}\n`);
  lines.push("---\n");

  for (const info of [...infos].sort((a, b) => a.className.localeCompare(b.className))) {
    lines.push(...renderType(info));
  }

  return lines.join("\n");
}

function renderType(info: TypeInfo): string[] {
  const lines = [`## ${info.className}\n`];

  const members = info.getMemberNames();
  if (members.length > 0) {
    lines.push("### Members\n");
    lines.push("| Name | Type |");
    lines.push("|------|------|");
    for (const name of members) {
      const sig = info.describeMember(name);
      if (sig) lines.push(`| \`${sig.name}\` | \`${sig.tag}\` |`);
    }
    lines.push("");
  }

  const methods = info.getMethodNames();
  if (methods.length > 0) {
    lines.push("### Methods\n");
    lines.push("| Name | Signature |");
    lines.push("|------|-----------|");
    for (const name of methods) {
      const sig = info.describeMethod(name);
      if (sig) lines.push(`| \`${sig.name}\` | \`(${sig.paramTags.join(", ")}) -> ${sig.returnTag}\` |`);
    }
    lines.push("");
  }

  return lines;
}

/**
 * Generate JSON schema dump of every registered type.
 */
export function generateJSON(registry: TypeRegistry, indent = 2): string {
  return JSON.stringify(registry.describeAll(), null, indent);
}
