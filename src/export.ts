/**
 * Memory export to JSON, Markdown and CSV. Entries are written newest
 * first by creation time; content blobs stay where they are.
 */

import { compareCreated } from "./entry";
import { MemoryEntry } from "./types";
import { toPrettyJson } from "./utils";

export const EXPORT_FORMATS = ["json", "markdown", "csv"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

const CSV_SUMMARY_LIMIT = 200;
const MARKDOWN_FILES_LIMIT = 5;

const CSV_COLUMNS = [
  "ID",
  "Title",
  "Type",
  "Scope",
  "Created",
  "Updated",
  "Tags",
  "Access Count",
  "Last Accessed",
  "Summary",
  "Keywords",
  "File",
];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

function newestFirst(memories: MemoryEntry[]): MemoryEntry[] {
  return [...memories].sort((a, b) => compareCreated(b, a));
}

export function exportToJson(memories: MemoryEntry[], now: Date = new Date()): string {
  return toPrettyJson({
    export_date: now.toISOString(),
    total_memories: memories.length,
    memories: newestFirst(memories).map((m) => ({
      id: m.id,
      title: m.title,
      type: m.type,
      scope: m.scope,
      created: m.created,
      updated: m.updated,
      tags: m.tags,
      summary: m.summary,
      keywords: m.keywords,
      triggers: m.triggers,
      file: m.file,
      access_count: m.access.count,
      last_accessed: m.access.last_accessed,
      files_modified: m.files_modified,
      decisions: m.decisions,
    })),
  });
}

export function exportToMarkdown(memories: MemoryEntry[], now: Date = new Date()): string {
  const lines = [
    "# Memory Export",
    "",
    `**Export Date**: ${now.toISOString().slice(0, 19).replace("T", " ")}`,
    `**Total Memories**: ${memories.length}`,
    "",
    "---",
    "",
  ];

  newestFirst(memories).forEach((m, i) => {
    lines.push(
      `## ${i + 1}. ${m.title}`,
      "",
      `- **ID**: \`${m.id}\``,
      `- **Type**: ${m.type}`,
      `- **Scope**: ${m.scope}`,
      `- **Created**: ${m.created}`,
      `- **Access Count**: ${m.access.count}`
    );
    if (m.access.last_accessed) lines.push(`- **Last Accessed**: ${m.access.last_accessed}`);
    if (m.tags.length) lines.push(`- **Tags**: ${m.tags.join(", ")}`);
    lines.push("");

    if (m.summary) lines.push("**Summary**:", m.summary, "");
    if (m.keywords.length) lines.push(`**Keywords**: ${m.keywords.join(", ")}`, "");

    if (m.files_modified.length) {
      lines.push("**Files Modified**:");
      for (const f of m.files_modified.slice(0, MARKDOWN_FILES_LIMIT)) lines.push(`- \`${f}\``);
      const more = m.files_modified.length - MARKDOWN_FILES_LIMIT;
      if (more > 0) lines.push(`- ...and ${more} more`);
      lines.push("");
    }

    if (m.decisions.length) {
      lines.push("**Decisions**:");
      for (const d of m.decisions) lines.push(`- ${d}`);
      lines.push("");
    }

    lines.push("---", "");
  });

  return lines.join("\n");
}

function csvField(value: string | number | null): string {
  const str = value === null ? "" : String(value);
  return `"${str.replace(/"/g, '""')}"`;
}

export function exportToCsv(memories: MemoryEntry[]): string {
  const rows = newestFirst(memories).map((m) => {
    const summary =
      m.summary.length > CSV_SUMMARY_LIMIT ? m.summary.slice(0, CSV_SUMMARY_LIMIT) + "..." : m.summary;
    return [
      m.id,
      m.title,
      m.type,
      m.scope,
      m.created,
      m.updated,
      m.tags.join(", "),
      m.access.count,
      m.access.last_accessed,
      summary,
      m.keywords.join(", "),
      m.file,
    ]
      .map(csvField)
      .join(",");
  });
  return [CSV_COLUMNS.map(csvField).join(","), ...rows].join("\n") + "\n";
}

export function exportMemories(memories: MemoryEntry[], format: ExportFormat, now: Date = new Date()): string {
  switch (format) {
    case "json":
      return exportToJson(memories, now);
    case "markdown":
      return exportToMarkdown(memories, now);
    case "csv":
      return exportToCsv(memories);
  }
}
