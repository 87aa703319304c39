/**
 * DDL1 词典解析器
 *
 * 每个 data_ 块（data_on_this_dictionary 除外）定义一个或多个旧式名称。
 * 规范名由 _category 推导：_cell_length_a（类别 cell）→ _cell.length_a；
 * 不以类别开头的名称保持原样。
 */

import type { DictionaryFormat, FieldMetadata } from "../types";
import { DictionaryParser, createTagView, presentOrNull, unquote } from "./base-dictionary-parser";
import type { TagView } from "./base-dictionary-parser";

interface DataBlock {
  name: string;
  lines: string[];
}

const BLOCK_OPEN = /^data_(\S+)\s*$/i;
const DICTIONARY_BLOCK = "on_this_dictionary";

function splitDataBlocks(content: string): DataBlock[] {
  const blocks: DataBlock[] = [];
  let current: DataBlock | null = null;
  let inText = false;

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith(";")) {
      inText = !inText;
    } else if (!inText) {
      const open = BLOCK_OPEN.exec(line);
      if (open) {
        if (current) blocks.push(current);
        current = { name: open[1] ?? "", lines: [] };
        continue;
      }
    }
    current?.lines.push(line);
  }
  if (current) blocks.push(current);

  return blocks;
}

/**
 * 由旧式名称与类别推导点分规范名
 */
export function deriveCanonicalName(name: string, category: string | null): string {
  if (!category) return name;
  const bare = name.replace(/^_/, "");
  const prefix = category.toLowerCase() + "_";
  if (!bare.toLowerCase().startsWith(prefix) || bare.length <= prefix.length) {
    return name;
  }
  return `_${bare.slice(0, category.length)}.${bare.slice(prefix.length)}`;
}

/** 一个 data_ 块解析出的记录（取代关系待解析） */
interface PendingDefinition {
  legacyName: string;
  canonical: string;
  view: TagView;
  category: string | null;
  replacedBy: string | null;
}

export class Ddl1DictionaryParser extends DictionaryParser {
  readonly format: DictionaryFormat = "DDL1";

  protected parseContent(): void {
    const pending: PendingDefinition[] = [];

    for (const block of splitDataBlocks(this.content)) {
      const view = createTagView(block.lines);

      if (block.name.toLowerCase() === DICTIONARY_BLOCK) {
        this.metadata = {
          title: presentOrNull(view.single("_dictionary_name")),
          version: presentOrNull(view.single("_dictionary_version")),
          date: presentOrNull(view.single("_dictionary_update")),
        };
        continue;
      }

      const category = presentOrNull(view.single("_category"));
      const names = view.values("_name").map(unquote).filter(name => name.startsWith("_"));

      if (category?.toLowerCase() === "category_overview") {
        for (const name of names) {
          this.registerCategory(name.replace(/_\[\]$/, ""));
        }
        continue;
      }

      const replacedBy = readReplacedBy(view);
      for (const legacyName of names) {
        pending.push({
          legacyName,
          canonical: deriveCanonicalName(legacyName, category),
          view,
          category,
          replacedBy,
        });
      }
    }

    // 取代目标也是旧式名称，换成其规范名
    const canonicalByLegacy = new Map<string, string>();
    for (const definition of pending) {
      canonicalByLegacy.set(definition.legacyName.toLowerCase(), definition.canonical);
    }

    for (const definition of pending) {
      const { view } = definition;
      const replacementBy = definition.replacedBy
        ? canonicalByLegacy.get(definition.replacedBy.toLowerCase()) ?? definition.replacedBy
        : null;
      const enumeration = view.values("_enumeration");

      const meta: FieldMetadata = {
        definitionId: definition.canonical,
        aliases: [{ name: definition.legacyName, deprecationDate: null }],
        typeContents: presentOrNull(view.single("_type")),
        typePurpose: null,
        typeContainer: null,
        typeSource: null,
        description: presentOrNull(view.single("_definition")),
        categoryId: definition.category,
        units: presentOrNull(view.single("_units")) ?? presentOrNull(view.single("_units_detail")),
        isReplaced: definition.replacedBy !== null,
        replacementBy,
        enumerationValues: enumeration.length > 0 ? enumeration : null,
      };
      this.registerField(meta);
    }
  }
}

/** _related_item + _related_function replace */
function readReplacedBy(view: TagView): string | null {
  const table = view.loop("_related_item");
  if (table) {
    const itemColumn = table.tags.indexOf("_related_item");
    const functionColumn = table.tags.indexOf("_related_function");
    for (const row of table.rows) {
      if (functionColumn >= 0 && row[functionColumn]?.toLowerCase() === "replace") {
        return presentOrNull(row[itemColumn] ?? null);
      }
    }
    return null;
  }

  const item = view.single("_related_item");
  const relation = view.single("_related_function");
  if (item && relation?.toLowerCase() === "replace") {
    return presentOrNull(item);
  }
  return null;
}
