/**
 * CifTextScanner - CIF 文本逐行分类
 *
 * 负责：
 * - 行类型识别（空行 / 注释 / data_ / loop_ / 字段 / 循环表头 / 循环数据 / 文本块）
 * - 分号文本块与 CIF2 三引号多行字符串
 * - 循环状态机 NORMAL → LOOP_FIELDS → LOOP_DATA → NORMAL
 * - 简单字段的取值范围
 * - 文末 DEPRECATED FIELDS 区段的拆分
 *
 * 所有改写操作只作用于字段 / 循环表头位置，文本块与循环数据行保持原样。
 */

import type { ConversionResult } from "../types";

// ============================================================================
// 类型
// ============================================================================

/** 行类型 */
export type CifLineKind =
  | "blank"
  | "comment"
  | "data_block"
  | "loop_keyword"
  | "save_frame"
  | "global"
  | "field"
  | "loop_header"
  | "loop_data"
  | "text_block"
  | "value";

/** 扫描后的单行 */
export interface CifLine {
  /** 从 0 开始 */
  index: number;
  raw: string;
  kind: CifLineKind;
  /** field / loop_header 行的字段名 */
  fieldName: string | null;
  indent: string;
  /** 字段名之后的原始文本（含前导空白） */
  rest: string;
  /** 所属循环编号（loop_ 行、表头、数据行） */
  loopId: number | null;
  /** 所属多行文本区域编号；三引号字符串的起始行也带此编号 */
  blockId: number | null;
}

/** 简单字段的取值范围 */
export interface FieldValueSpan {
  start: number;
  end: number;
  /** 无值时为 null */
  value: string | null;
}

/** 文末弃用区段条目 */
export interface DeprecatedSectionEntry {
  fieldName: string;
  value: string;
}

/** 拆分后的文档 */
export interface DeprecatedSectionSplit {
  bodyLines: string[];
  sectionLines: string[];
  trailingLines: string[];
  entries: DeprecatedSectionEntry[];
}

type LoopState = "NORMAL" | "LOOP_FIELDS" | "LOOP_DATA";

/** 文档换行符 */
export type LineEnding = "\n" | "\r\n";

// ============================================================================
// 常量
// ============================================================================

/** 字段行：缩进 + 字段名 + 其余 */
export const FIELD_LINE = /^(\s*)(_[a-zA-Z][a-zA-Z0-9_.\-[\]()/]*)(?=\s|$)(.*)$/;

export const DEPRECATED_SECTION_MARKER = "# DEPRECATED FIELDS";
export const DEPRECATED_SECTION_END = "# END OF DEPRECATED FIELDS SECTION";

const SEPARATOR_LINE = /^#\s*=+\s*$/;
const TRIPLE_QUOTES = ['"""', "'''"] as const;

// ============================================================================
// 扫描
// ============================================================================

/** 按 LF 或 CRLF 拆行，行内不带 \r */
export function splitCifLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/** 文档首个换行为 CRLF 时沿用 CRLF */
export function detectLineEnding(content: string): LineEnding {
  const newline = content.indexOf("\n");
  return newline > 0 && content[newline - 1] === "\r" ? "\r\n" : "\n";
}

function isBlank(char: string | undefined): boolean {
  return char === undefined || /\s/.test(char);
}

/**
 * 返回未闭合的三引号定界符；全部闭合时返回 null
 *
 * 只在取值记号开头识别三引号（行首或空白之后），记号外的 # 之后为注释。
 */
export function opensTripleQuote(text: string): string | null {
  let position = 0;

  while (position < text.length) {
    const char = text[position] ?? "";
    if (/\s/.test(char)) {
      position++;
      continue;
    }
    if (char === "#") return null;

    const delimiter = TRIPLE_QUOTES.find(candidate => text.startsWith(candidate, position));
    if (delimiter !== undefined) {
      const close = text.indexOf(delimiter, position + 3);
      if (close < 0) return delimiter;
      position = close + 3;
      continue;
    }

    // 引号字符串：同种引号后接空白才算结束
    if (char === "'" || char === '"') {
      let end = position + 1;
      while (end < text.length && !(text[end] === char && isBlank(text[end + 1]))) {
        end++;
      }
      position = end + 1;
      continue;
    }

    // 普通记号
    while (position < text.length && !/\s/.test(text[position] ?? "")) {
      position++;
    }
  }

  return null;
}

/**
 * 逐行扫描 CIF 文本
 */
export function scanCifLines(content: string): CifLine[] {
  const rawLines = splitCifLines(content);
  const result: CifLine[] = [];

  let state: LoopState = "NORMAL";
  let loopCounter = 0;
  let blockCounter = 0;
  let inSemicolonBlock = false;
  let tripleDelimiter: string | null = null;

  const push = (
    index: number,
    raw: string,
    kind: CifLineKind,
    extra: Partial<Omit<CifLine, "index" | "raw" | "kind">> = {}
  ): CifLine => {
    const line: CifLine = {
      index,
      raw,
      kind,
      fieldName: extra.fieldName ?? null,
      indent: extra.indent ?? "",
      rest: extra.rest ?? "",
      loopId: extra.loopId ?? (state === "NORMAL" ? null : loopCounter),
      blockId: extra.blockId ?? null,
    };
    result.push(line);
    return line;
  };

  rawLines.forEach((raw, index) => {
    // 三引号多行字符串
    if (tripleDelimiter !== null) {
      push(index, raw, "text_block", { blockId: blockCounter });
      if (raw.includes(tripleDelimiter)) {
        tripleDelimiter = null;
      }
      return;
    }

    // 分号文本块
    if (inSemicolonBlock) {
      push(index, raw, "text_block", { blockId: blockCounter });
      if (raw.startsWith(";")) {
        inSemicolonBlock = false;
      }
      return;
    }
    if (raw.startsWith(";")) {
      blockCounter++;
      inSemicolonBlock = true;
      if (state === "LOOP_FIELDS") {
        state = "LOOP_DATA";
      }
      push(index, raw, "text_block", { blockId: blockCounter });
      return;
    }

    const trimmed = raw.trim();
    if (!trimmed) {
      push(index, raw, "blank");
      return;
    }
    if (trimmed.startsWith("#")) {
      push(index, raw, "comment");
      return;
    }

    if (/^loop_(\s|$)/i.test(trimmed)) {
      loopCounter++;
      state = "LOOP_FIELDS";
      push(index, raw, "loop_keyword");
      return;
    }
    if (/^data_/i.test(trimmed)) {
      state = "NORMAL";
      push(index, raw, "data_block");
      return;
    }
    if (/^save_/i.test(trimmed)) {
      state = "NORMAL";
      push(index, raw, "save_frame");
      return;
    }
    if (/^global_/i.test(trimmed)) {
      state = "NORMAL";
      push(index, raw, "global");
      return;
    }

    const match = FIELD_LINE.exec(raw);
    if (match) {
      const [, indent = "", fieldName = "", rest = ""] = match;
      if (state === "LOOP_FIELDS") {
        push(index, raw, "loop_header", { fieldName, indent, rest });
        return;
      }
      state = "NORMAL";
      const line = push(index, raw, "field", { fieldName, indent, rest });
      const delimiter = opensTripleQuote(rest);
      if (delimiter !== null) {
        blockCounter++;
        tripleDelimiter = delimiter;
        line.blockId = blockCounter;
      }
      return;
    }

    if (state === "LOOP_FIELDS") {
      state = "LOOP_DATA";
    }
    const line = push(index, raw, state === "LOOP_DATA" ? "loop_data" : "value");
    const delimiter = opensTripleQuote(raw);
    if (delimiter !== null) {
      blockCounter++;
      tripleDelimiter = delimiter;
      line.blockId = blockCounter;
    }
  });

  return result;
}

/**
 * 判断是否为带名称的字段位置（简单字段或循环表头）
 */
export function isNamedLine(line: CifLine): boolean {
  return line.kind === "field" || line.kind === "loop_header";
}

// ============================================================================
// 取值范围
// ============================================================================

function lastLineOfBlock(lines: readonly CifLine[], start: number): number {
  const blockId = lines[start]?.blockId ?? null;
  if (blockId === null) return start;
  let end = start;
  while (lines[end + 1]?.blockId === blockId) {
    end++;
  }
  return end;
}

function semicolonBlockValue(lines: readonly CifLine[], start: number, end: number): string {
  const body: string[] = [];
  const opener = lines[start]?.raw.slice(1) ?? "";
  if (opener.trim()) {
    body.push(opener);
  }
  for (let i = start + 1; i < end; i++) {
    body.push(lines[i]?.raw ?? "");
  }
  // 未闭合的文本块：最后一行也是正文
  const closing = lines[end];
  if (end > start && closing && !closing.raw.startsWith(";")) {
    body.push(closing.raw);
  }
  return body.join("\n");
}

/**
 * 简单字段的取值：同行、下一行或紧随的文本块
 */
export function getFieldValueSpan(lines: readonly CifLine[], index: number): FieldValueSpan {
  const line = lines[index];
  if (!line || line.kind !== "field") {
    return { start: index, end: index, value: null };
  }

  const inline = line.rest.trim();
  if (inline) {
    const end = lastLineOfBlock(lines, index);
    if (end === index) {
      return { start: index, end, value: inline };
    }
    const continuation = lines.slice(index + 1, end + 1).map(l => l.raw);
    return { start: index, end, value: [inline, ...continuation].join("\n") };
  }

  const next = lines[index + 1];
  if (!next) {
    return { start: index, end: index, value: null };
  }

  if (next.kind === "text_block" && next.raw.startsWith(";")) {
    const end = lastLineOfBlock(lines, index + 1);
    return { start: index, end, value: semicolonBlockValue(lines, index + 1, end) };
  }

  if (next.kind === "value") {
    const end = lastLineOfBlock(lines, index + 1);
    const parts = [next.raw.trim(), ...lines.slice(index + 2, end + 1).map(l => l.raw)];
    return { start: index, end, value: parts.join("\n") };
  }

  return { start: index, end: index, value: null };
}

// ============================================================================
// 弃用区段
// ============================================================================

/**
 * 拆分文末 DEPRECATED FIELDS 区段
 *
 * 拼接 bodyLines + sectionLines + trailingLines 可还原原文。
 */
export function splitDeprecatedSection(content: string): DeprecatedSectionSplit {
  const lines = splitCifLines(content);
  const markerIndex = lines.findIndex(line => line.includes(DEPRECATED_SECTION_MARKER));
  if (markerIndex < 0) {
    return { bodyLines: lines, sectionLines: [], trailingLines: [], entries: [] };
  }

  let start = markerIndex;
  while (start > 0) {
    const previous = (lines[start - 1] ?? "").trim();
    if (previous === "" || SEPARATOR_LINE.test(previous)) {
      start--;
    } else {
      break;
    }
  }

  let end = lines.length;
  for (let i = markerIndex + 1; i < lines.length; i++) {
    if ((lines[i] ?? "").includes(DEPRECATED_SECTION_END)) {
      end = i + 1;
      if (SEPARATOR_LINE.test((lines[end] ?? "").trim())) {
        end++;
      }
      break;
    }
  }

  const sectionLines = lines.slice(start, end);
  const entries: DeprecatedSectionEntry[] = [];
  for (const line of sectionLines) {
    const match = FIELD_LINE.exec(line);
    if (match) {
      entries.push({ fieldName: match[2] ?? "", value: (match[3] ?? "").trim() });
    }
  }

  return {
    bodyLines: lines.slice(0, start),
    sectionLines,
    trailingLines: lines.slice(end),
    entries,
  };
}

// ============================================================================
// 改写
// ============================================================================

/**
 * 重命名字段：只改写字段与循环表头位置（大小写不敏感匹配）
 */
export function renameField(content: string, from: string, to: string): ConversionResult {
  const lines = scanCifLines(content);
  const target = from.toLowerCase();
  const changes: string[] = [];

  const output = lines.map(line => {
    if (!isNamedLine(line) || line.fieldName?.toLowerCase() !== target) {
      return line.raw;
    }
    const updated = `${line.indent}${to}${line.rest}`;
    if (updated !== line.raw) {
      changes.push(`Line ${line.index + 1}: ${line.raw.trim()} → ${updated.trim()}`);
    }
    return updated;
  });

  return { content: output.join(detectLineEnding(content)), changes };
}

/**
 * 文档中出现的全部字段名（字段与循环表头，按出现顺序，可重复）
 */
export function extractFieldNames(content: string): string[] {
  return scanCifLines(content)
    .filter(isNamedLine)
    .map(line => line.fieldName ?? "")
    .filter(name => name !== "");
}
