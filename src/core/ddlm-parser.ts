/**
 * DDLm 词典解析器
 *
 * 按 save_<name> ... save_ 帧解析。类别帧只记录类别名，
 * 字段帧提取 _definition.id、别名、取代关系、类型与枚举。
 */

import type { DictionaryFormat, FieldAlias, FieldMetadata } from "../types";
import { DictionaryParser, createTagView, presentOrNull, unquote } from "./base-dictionary-parser";
import type { TagView } from "./base-dictionary-parser";

interface SaveFrame {
  name: string;
  lines: string[];
}

const FRAME_OPEN = /^\s*save_(\S+)\s*$/i;
const FRAME_CLOSE = /^\s*save_\s*$/i;

/**
 * 拆分 save 帧；帧外的行作为文件头返回
 */
export function splitSaveFrames(content: string): { head: string[]; frames: SaveFrame[] } {
  const head: string[] = [];
  const frames: SaveFrame[] = [];
  let current: SaveFrame | null = null;
  let inText = false;

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith(";")) {
      inText = !inText;
    } else if (!inText) {
      if (FRAME_CLOSE.test(line)) {
        if (current) frames.push(current);
        current = null;
        continue;
      }
      const open = FRAME_OPEN.exec(line);
      if (open) {
        if (current) frames.push(current);
        current = { name: open[1] ?? "", lines: [] };
        continue;
      }
    }
    if (current) {
      current.lines.push(line);
    } else {
      head.push(line);
    }
  }
  if (current) frames.push(current);

  return { head, frames };
}

function isUpperCaseName(name: string): boolean {
  return name === name.toUpperCase() && name !== name.toLowerCase();
}

export class DdlmDictionaryParser extends DictionaryParser {
  readonly format: DictionaryFormat = "DDLm";

  protected parseContent(): void {
    const { head, frames } = splitSaveFrames(this.content);

    const header = createTagView(head);
    this.metadata = {
      title: presentOrNull(header.single("_dictionary.title")),
      version: presentOrNull(header.single("_dictionary.version")),
      date: presentOrNull(header.single("_dictionary.date")),
    };

    for (const frame of frames) {
      this.parseFrame(frame);
    }
  }

  private parseFrame(frame: SaveFrame): void {
    const view = createTagView(frame.lines);
    const definitionId = presentOrNull(view.single("_definition.id"));
    const scope = view.single("_definition.scope")?.toLowerCase() ?? null;

    // 类别帧
    if (definitionId === null || scope === "category" || isUpperCaseName(frame.name)) {
      const frameClass = view.single("_definition.class")?.toLowerCase() ?? null;
      if (definitionId !== null && frameClass !== "head") {
        this.registerCategory(definitionId);
      }
      return;
    }

    const { isReplaced, replacementBy } = readReplacement(view);
    const meta: FieldMetadata = {
      definitionId,
      aliases: readAliases(view),
      typeContents: presentOrNull(view.single("_type.contents")),
      typePurpose: presentOrNull(view.single("_type.purpose")),
      typeContainer: presentOrNull(view.single("_type.container")),
      typeSource: presentOrNull(view.single("_type.source")),
      description: presentOrNull(view.single("_description.text")),
      categoryId: presentOrNull(view.single("_name.category_id")),
      units: presentOrNull(view.single("_units.code")),
      isReplaced,
      replacementBy,
      enumerationValues: readEnumeration(view),
    };
    this.registerField(meta);
  }
}

/** 单行别名或一 / 两列别名循环 */
function readAliases(view: TagView): FieldAlias[] {
  const aliases: FieldAlias[] = [];

  const single = view.single("_alias.definition_id");
  if (single) {
    aliases.push({
      name: unquote(single),
      deprecationDate: presentDate(view.single("_alias.deprecation_date")),
    });
  }

  const table = view.loop("_alias.definition_id");
  if (table) {
    const nameColumn = table.tags.indexOf("_alias.definition_id");
    const dateColumn = table.tags.indexOf("_alias.deprecation_date");
    for (const row of table.rows) {
      const name = row[nameColumn];
      if (!name) continue;
      aliases.push({
        name,
        deprecationDate: dateColumn >= 0 ? presentDate(row[dateColumn] ?? null) : null,
      });
    }
  }

  return aliases;
}

/** "." 保留为占位符，"?" 与空值视为缺省 */
function presentDate(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" || trimmed === "?" ? null : trimmed;
}

/** 取代关系：单值，或循环中 id 为 1 的行（否则第一行） */
function readReplacement(view: TagView): { isReplaced: boolean; replacementBy: string | null } {
  const table = view.loop("_definition_replaced.by") ?? view.loop("_definition_replaced.id");
  if (table) {
    const idColumn = table.tags.indexOf("_definition_replaced.id");
    const byColumn = table.tags.indexOf("_definition_replaced.by");
    const preferred = table.rows.find(row => idColumn >= 0 && row[idColumn] === "1") ?? table.rows[0];
    const by = preferred && byColumn >= 0 ? preferred[byColumn] ?? null : null;
    return { isReplaced: true, replacementBy: presentOrNull(by) };
  }

  const id = view.single("_definition_replaced.id");
  const by = view.single("_definition_replaced.by");
  if (id === null && by === null) {
    return { isReplaced: false, replacementBy: null };
  }
  return { isReplaced: true, replacementBy: presentOrNull(by) };
}

function readEnumeration(view: TagView): string[] | null {
  const values = view.values("_enumeration_set.state");
  return values.length > 0 ? values : null;
}
