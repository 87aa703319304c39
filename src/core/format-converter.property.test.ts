/**
 * FormatConverter 属性测试
 * 使用 fast-check 进行基于属性的测试
 */

import { describe, test, expect } from "vitest";
import * as fc from "fast-check";
import { FormatConverter } from "./format-converter";
import { extractFieldNames } from "./cif-text-scanner";
import { arbCif1Document, createTestLogger, createTestManager } from "../test-utils";

describe("FormatConverter 属性测试", () => {
  const logger = createTestLogger();
  const converter = new FormatConverter(createTestManager({ logger }), logger);

  /**
   * 属性：转换结果再次转换为 CIF2 时内容不变，且不产生变更
   */
  test("CIF2 转换幂等", () => {
    fc.assert(
      fc.property(arbCif1Document(), document => {
        const once = converter.convertToCif2(document);
        const twice = converter.convertToCif2(once.content);
        expect(twice.content).toBe(once.content);
        expect(twice.changes).toEqual([]);
      }),
      { numRuns: 100 }
    );
  });

  /**
   * 属性：已知旧写法字段全部改写为点分写法，字段数不变
   */
  test("已知字段全部改写为点分写法", () => {
    fc.assert(
      fc.property(arbCif1Document(), document => {
        const before = extractFieldNames(document);
        const after = extractFieldNames(converter.convertToCif2(document).content);
        expect(after).toHaveLength(before.length);
        expect(after.every(name => name.includes("."))).toBe(true);
      }),
      { numRuns: 100 }
    );
  });

  /**
   * 属性：文本块中的内容原样保留
   */
  test("文本块内容不被改写", () => {
    fc.assert(
      fc.property(arbCif1Document(), document => {
        const block = document.trimEnd();
        const content = `data_x\n_refine_special_details\n;\n${block}\n;`;
        const result = converter.convertToCif2(content);
        expect(result.content.endsWith(`\n;\n${block}\n;`)).toBe(true);
      }),
      { numRuns: 100 }
    );
  });

  /**
   * 属性：CIF2 → CIF1 → CIF2 回到同一正文
   */
  test("往返转换还原字段", () => {
    fc.assert(
      fc.property(arbCif1Document(), document => {
        const cif2 = converter.convertToCif2(document).content;
        const back = converter.convertToCif2(converter.convertToCif1(cif2).content).content;
        expect(extractFieldNames(back)).toEqual(extractFieldNames(cif2));
      }),
      { numRuns: 50 }
    );
  });
});
