/**
 * 文末 DEPRECATED FIELDS 区段的生成
 */

import { DEPRECATED_SECTION_END, DEPRECATED_SECTION_MARKER } from "./cif-text-scanner";

const SEPARATOR = "# " + "=".repeat(76);
/** 对齐宽度上限，保持 80 列以内 */
const MAX_NAME_WIDTH = 40;

/** 区段条目：字段名、原始值、替代字段 */
export interface DeprecatedSectionItem {
  fieldName: string;
  value: string;
  replacement: string | null;
}

/**
 * 生成区段行（以两个空行开头，以一个空行结尾）
 */
export function buildDeprecatedSection(items: readonly DeprecatedSectionItem[]): string[] {
  const lines = [
    "",
    "",
    SEPARATOR,
    `${DEPRECATED_SECTION_MARKER} (retained for compatibility with older software)`,
    SEPARATOR,
    "# The following fields are deprecated in the CIF specification.",
    "# Modern equivalents have been used above where available.",
    "# These deprecated forms are retained here for backward compatibility.",
    SEPARATOR,
    "",
  ];

  const width = Math.min(
    MAX_NAME_WIDTH,
    items.reduce((max, item) => Math.max(max, item.fieldName.length), 0)
  );

  const sorted = [...items].sort((a, b) =>
    a.fieldName < b.fieldName ? -1 : a.fieldName > b.fieldName ? 1 : 0
  );
  for (const item of sorted) {
    lines.push(`${item.fieldName.padEnd(width)} ${item.value}`);
    if (item.replacement && item.replacement !== item.fieldName) {
      lines.push(`# Replaced by: ${item.replacement}`);
    } else {
      lines.push("# No modern replacement");
    }
  }

  lines.push("", SEPARATOR, DEPRECATED_SECTION_END, SEPARATOR, "");
  return lines;
}

/**
 * 在正文最后一个非空行之后插入区段
 */
export function insertDeprecatedSection(bodyLines: readonly string[], section: readonly string[]): string[] {
  let lastContent = bodyLines.length - 1;
  while (lastContent >= 0 && !(bodyLines[lastContent] ?? "").trim()) {
    lastContent--;
  }
  return [
    ...bodyLines.slice(0, lastContent + 1),
    ...section,
    ...bodyLines.slice(lastContent + 1),
  ];
}
