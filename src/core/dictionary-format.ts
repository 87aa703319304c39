/**
 * 词典格式检测与解析器工厂
 *
 * 词典本身是自由格式的 CIF 文本，没有统一的自描述标记，
 * 因此按加权指标打分：最高分胜出；与次高分差距不足 1.5 倍时
 * 再看几个决定性标记。
 */

import type { DictionaryFormat } from "../types";
import { CifModelError } from "../types";
import type { DictionaryParser } from "./base-dictionary-parser";
import { Ddl1DictionaryParser } from "./ddl1-parser";
import { DdlmDictionaryParser } from "./ddlm-parser";

/** 各格式的得分 */
export type FormatScores = Record<Exclude<DictionaryFormat, "UNKNOWN">, number>;

interface Indicator {
  pattern: RegExp;
  weight: number;
}

const DDLM_INDICATORS: Indicator[] = [
  { pattern: /_dictionary\.title\b/, weight: 3 },
  { pattern: /_definition\.id\b/, weight: 5 },
  { pattern: /_name\.category_id\b/, weight: 2 },
  { pattern: /_description\.text\b/, weight: 2 },
  { pattern: /_type\.contents\b/, weight: 2 },
  { pattern: /_alias\.definition_id\b/, weight: 2 },
  { pattern: /_dictionary\.ddl_conformance\b/, weight: 3 },
];

const DDL1_INDICATORS: Indicator[] = [
  { pattern: /^data_on_this_dictionary\s*$/m, weight: 5 },
  { pattern: /_dictionary_name\b/, weight: 3 },
  { pattern: /_dictionary_version\b/, weight: 1 },
  { pattern: /_dictionary_update\b/, weight: 1 },
];

const DDL2_INDICATORS: Indicator[] = [
  { pattern: /_item\.name\b/, weight: 4 },
  { pattern: /_item\.category_id\b/, weight: 3 },
  { pattern: /_item_description\.description\b/, weight: 3 },
  { pattern: /_item_type\.code\b/, weight: 3 },
  { pattern: /_item_aliases\.alias_name\b/, weight: 2 },
  { pattern: /_datablock\.id\b/, weight: 2 },
];

function score(content: string, indicators: readonly Indicator[]): number {
  return indicators.reduce((total, { pattern, weight }) => total + (pattern.test(content) ? weight : 0), 0);
}

function countMatches(content: string, pattern: RegExp): number {
  return content.match(pattern)?.length ?? 0;
}

/**
 * 计算各格式得分
 */
export function scoreDictionaryFormats(content: string): FormatScores {
  const hasSaveFrames = /^save_\S+/m.test(content);
  const hasDataBlocks = /^data_\S+/m.test(content);

  let ddl1 = score(content, DDL1_INDICATORS);
  if (hasDataBlocks && !hasSaveFrames) ddl1 += 5;
  if (countMatches(content, /(?:^|\n)\s*_name\s+/g) > 5) ddl1 += 3;
  if (countMatches(content, /^\s*_type\s+(?:char|numb|null)\s*$/gm) > 5) ddl1 += 3;
  if (/_related_item\b/.test(content) && /_related_function\b/.test(content)) ddl1 += 2;

  let ddl2 = score(content, DDL2_INDICATORS);
  if (hasSaveFrames && countMatches(content, /^save__\S+/gm) > 5) ddl2 += 5;

  return { DDLm: score(content, DDLM_INDICATORS), DDL1: ddl1, DDL2: ddl2 };
}

/**
 * 检测词典格式；得分全为 0 时返回 UNKNOWN
 */
export function detectDictionaryFormat(content: string): DictionaryFormat {
  const scores = scoreDictionaryFormats(content);
  // 同分时按 DDLm、DDL1、DDL2 顺序取第一个
  const ranked: Array<[Exclude<DictionaryFormat, "UNKNOWN">, number]> = [
    ["DDLm", scores.DDLm],
    ["DDL1", scores.DDL1],
    ["DDL2", scores.DDL2],
  ];

  let winner = ranked[0];
  for (const entry of ranked) {
    if (entry[1] > winner[1]) winner = entry;
  }
  const maxScore = winner[1];
  if (maxScore === 0) return "UNKNOWN";

  const runnerUp = ranked
    .map(([, value]) => value)
    .sort((a, b) => b - a)[1] ?? 0;

  if (runnerUp > 0 && maxScore < runnerUp * 1.5) {
    if (/_definition\.id\b/.test(content)) return "DDLm";
    if (/_item\.name\b/.test(content)) return "DDL2";
    if (/^data_on_this_dictionary\s*$/m.test(content)) return "DDL1";
  }

  return winner[0];
}

/**
 * 格式的可读描述
 */
export function describeDictionaryFormat(format: DictionaryFormat): string {
  switch (format) {
    case "DDLm":
      return "DDLm (modern, CIF2-era)";
    case "DDL1":
      return "DDL1 (legacy, CIF1-era)";
    case "DDL2":
      return "DDL2 (intermediate, mmCIF-era)";
    default:
      return "Unknown format";
  }
}

function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] || path;
}

/**
 * 按检测结果创建解析器
 *
 * @throws CifModelError E110_UNSUPPORTED_DICTIONARY_FORMAT DDL2 或无法识别
 */
export function createDictionaryParser(
  path: string,
  content: string,
  formatHint?: DictionaryFormat
): DictionaryParser {
  const format = formatHint ?? detectDictionaryFormat(content);
  const name = baseName(path);

  switch (format) {
    case "DDLm":
      return new DdlmDictionaryParser(path, content);
    case "DDL1":
      return new Ddl1DictionaryParser(path, content);
    case "DDL2":
      throw new CifModelError(
        "E110_UNSUPPORTED_DICTIONARY_FORMAT",
        `DDL2 dictionary format detected for '${name}'. DDL2 parsing is not supported; ` +
          "use a DDLm version of this dictionary instead.",
        { path, format }
      );
    default:
      throw new CifModelError(
        "E110_UNSUPPORTED_DICTIONARY_FORMAT",
        `Cannot determine dictionary format for '${name}'. Only DDLm and DDL1 formats are supported.`,
        { path, format }
      );
  }
}
