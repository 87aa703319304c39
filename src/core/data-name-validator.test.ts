/**
 * DataNameValidator 单元测试
 */

import { describe, it, expect, beforeEach } from "vitest";
import { DataNameValidator } from "./data-name-validator";
import { PrefixRegistry } from "./registered-prefixes";
import type { DictionaryManager } from "./dictionary-manager";
import {
  MemoryDictionaryReader,
  MemoryPreferenceStore,
  buildDdlmDictionary,
  createTestLogger,
  createTestManager,
  logEvents,
} from "../test-utils";
import type { Logger } from "../data/logger";
import { countValidationIssues, hasValidationIssues } from "../types";

const POWDER = buildDdlmDictionary("CIF_POW", [{ id: "_pd_phase.name", aliases: ["_pd_phase_name"] }]);

describe("DataNameValidator", () => {
  let logger: Logger;
  let manager: DictionaryManager;
  let preferences: MemoryPreferenceStore;
  let validator: DataNameValidator;

  beforeEach(() => {
    logger = createTestLogger();
    manager = createTestManager({
      logger,
      reader: new MemoryDictionaryReader({ "/dicts/cif_pow.dic": POWDER }),
    });
    preferences = new MemoryPreferenceStore();
    validator = new DataNameValidator({ manager, prefixes: new PrefixRegistry(), preferences, logger });
    validator.initialize();
  });

  describe("字段分类", () => {
    it("词典已知字段为 valid", () => {
      expect(validator.validateField("_cell_length_a", 2)).toEqual({
        fieldName: "_cell_length_a",
        category: "valid",
        lineNumber: 2,
        description: "Known in dictionary",
        suggestedDictionary: null,
        modernEquivalent: null,
        prefix: "cell",
        suggestedFormat: null,
        embeddedPrefix: null,
      });
    });

    it("弃用判断先于已知判断", () => {
      const result = validator.validateField("_symmetry_cell_setting");
      expect(result.category).toBe("deprecated");
      expect(result.description).toBe("Field is deprecated");
      expect(result.modernEquivalent).toBe("_space_group.crystal_system");
    });

    it("已注册前缀为 registered_local", () => {
      const result = validator.validateField("_shelx_res_file");
      expect(result.category).toBe("registered_local");
      expect(result.description).toBe("Uses registered prefix 'shelx': SHELX structure determination programs");
      expect(result.suggestedDictionary).toBe("cif_shelxl.dic");
    });

    it("检测嵌入式本地前缀", () => {
      expect(validator.validateField("_chemical_oxdiff_formula")).toMatchObject({
        category: "unknown",
        description: "Unknown field with embedded local prefix 'oxdiff'",
        embeddedPrefix: "oxdiff",
        suggestedFormat: "_chemical.oxdiff_formula",
        suggestedDictionary: null,
      });
    });

    it("嵌入前缀按最长类别匹配", () => {
      expect(validator.detectEmbeddedPrefix("_atom_site_mylab_flag")).toEqual({
        embeddedPrefix: "mylab",
        suggestedFormat: "_atom_site.mylab_flag",
      });
      expect(validator.detectEmbeddedPrefix("_cell_length_x")).toBeNull();
      expect(validator.detectEmbeddedPrefix("_chemical.oxdiff_formula")).toBeNull();
      expect(validator.detectEmbeddedPrefix("_foo_bar")).toBeNull();
    });

    it("嵌入前缀已注册时改判为 registered_local", () => {
      const result = validator.validateField("_chemical_olex2_thing");
      expect(result.category).toBe("registered_local");
      expect(result.description).toBe(
        "Uses registered embedded prefix 'olex2': Olex2 structure solution and refinement suite"
      );
      expect(result.suggestedFormat).toBe("_chemical.olex2_thing");
    });

    it("未知字段按前缀建议词典", () => {
      const result = validator.validateField("_pd_phase_name");
      expect(result.category).toBe("unknown");
      expect(result.description).toBe("Not found in loaded dictionaries");
      expect(result.suggestedDictionary).toBe("cif_pow.dic");
    });

    it("缓存按小写名复用并更新行号", () => {
      validator.validateField("_cell_length_a", 2);
      const reused = validator.validateField("_CELL_LENGTH_A", 7);
      expect(reused.fieldName).toBe("_CELL_LENGTH_A");
      expect(reused.lineNumber).toBe(7);
      expect(reused.category).toBe("valid");
    });

    it("词典变化时清空缓存", () => {
      expect(validator.validateField("_pd_phase_name").category).toBe("unknown");
      manager.addDictionary("/dicts/cif_pow.dic");
      expect(validator.validateField("_pd_phase_name").category).toBe("valid");
    });

    it("isFieldValid", () => {
      expect(validator.isFieldValid("_cell_length_a")).toBe(true);
      expect(validator.isFieldValid("_shelx_res_file")).toBe(true);
      expect(validator.isFieldValid("_foo_bar")).toBe(false);
      expect(validator.isFieldValid("_symmetry_cell_setting")).toBe(false);
    });
  });

  describe("用户偏好", () => {
    it("允许字段后改判并持久化", async () => {
      expect(validator.validateField("_foo_bar").category).toBe("unknown");
      const result = await validator.addAllowedField("_Foo_Bar");

      expect(result.ok).toBe(true);
      expect(preferences.values.allowedFields).toEqual(["_foo_bar"]);
      expect(validator.validateField("_foo_bar")).toMatchObject({
        category: "user_allowed",
        description: "Field allowed by user",
      });

      await validator.removeAllowedField("_foo_bar");
      expect(preferences.values.allowedFields).toEqual([]);
      expect(validator.validateField("_foo_bar").category).toBe("unknown");
    });

    it("拒绝非数据名", async () => {
      const result = await validator.addAllowedField("foo");
      expect(result.ok ? null : result.error.code).toBe("E101_INVALID_INPUT");
      const empty = await validator.addAllowedPrefix("__");
      expect(empty.ok ? null : empty.error.code).toBe("E101_INVALID_INPUT");
    });

    it("允许前缀（去掉下划线与大小写）", async () => {
      await validator.addAllowedPrefix("_MyLab_");
      expect(validator.getAllowedPrefixes()).toEqual(["mylab"]);
      expect(preferences.values.allowedPrefixes).toEqual(["mylab"]);
      expect(validator.validateField("_mylab_thing").description).toBe("Prefix 'mylab' allowed by user");

      await validator.removeAllowedPrefix("mylab");
      expect(preferences.values.allowedPrefixes).toEqual([]);
    });

    it("允许嵌入前缀", async () => {
      await validator.addAllowedPrefix("oxdiff");
      expect(validator.validateField("_chemical_oxdiff_formula")).toMatchObject({
        category: "user_allowed",
        description: "Embedded prefix 'oxdiff' allowed by user",
      });
    });

    it("本次会话忽略", () => {
      validator.validateField("_foo_bar");
      validator.addSessionIgnored("_FOO_BAR");
      expect(validator.validateField("_foo_bar").description).toBe("Ignored for this session");
      expect(preferences.values.allowedFields).toEqual([]);
    });

    it("initialize 读取已保存的偏好", () => {
      preferences.values.allowedFields = [" _X_Y "];
      preferences.values.allowedPrefixes = ["Lab"];
      validator.initialize();
      expect(validator.getAllowedFields()).toEqual(["_x_y"]);
      expect(validator.getAllowedPrefixes()).toEqual(["lab"]);
      expect(logEvents(logger)).toContain("PREFERENCES_LOADED");
    });

    it("保存失败时返回错误并记录日志", async () => {
      preferences.failSaves = true;
      const result = await validator.addAllowedField("_foo_bar");
      expect(result.ok ? null : result.error.code).toBe("E303_DISK_FULL");
      expect(logEvents(logger)).toContain("PREFERENCES_SAVE_FAILED");
    });
  });

  describe("文档校验", () => {
    const content = [
      "data_x",
      "# _comment_field 1",
      "_cell_length_a 5",
      "_CELL_LENGTH_A 5",
      "_symmetry_cell_setting mono",
      "loop_",
      "_shelx_hkl_line",
      "_chemical_oxdiff_formula",
      "a b",
      "_refine_special_details",
      ";",
      "_hidden_field inside",
      ";",
    ].join("\n");

    it("按类别汇总，同名只报告首次出现", () => {
      const report = validator.validateCifContent(content);
      const names = (results: { fieldName: string; lineNumber: number }[]) =>
        results.map(r => [r.fieldName, r.lineNumber]);

      expect(report.totalFields).toBe(5);
      expect(names(report.validFields)).toEqual([
        ["_cell_length_a", 3],
        ["_refine_special_details", 10],
      ]);
      expect(names(report.deprecatedFields)).toEqual([["_symmetry_cell_setting", 5]]);
      expect(names(report.registeredLocalFields)).toEqual([["_shelx_hkl_line", 7]]);
      expect(names(report.unknownFields)).toEqual([["_chemical_oxdiff_formula", 8]]);
      expect(report.userAllowedFields).toEqual([]);
      expect(countValidationIssues(report)).toBe(2);
      expect(hasValidationIssues(report)).toBe(true);
      expect(logEvents(logger)).toContain("DATA_NAMES_VALIDATED");
    });

    it("全部字段已知时没有待处理问题", () => {
      const report = validator.validateCifContent("data_x\n_cell_length_a 5\n_shelx_res_file x");
      expect(countValidationIssues(report)).toBe(0);
      expect(hasValidationIssues(report)).toBe(false);
    });
  });

  describe("applyFieldAction", () => {
    it("替换为现代写法", async () => {
      const content = "data_x\n_symmetry_cell_setting mono";
      const result = await validator.applyFieldAction(
        content,
        validator.validateField("_symmetry_cell_setting", 2),
        "replace_modern"
      );
      expect(result.ok ? result.value : null).toEqual({
        content: "data_x\n_space_group.crystal_system mono",
        changes: ["Line 2: _symmetry_cell_setting mono → _space_group.crystal_system mono"],
      });
    });

    it("修正嵌入前缀", async () => {
      const content = "data_x\n_chemical_oxdiff_formula C6";
      const result = await validator.applyFieldAction(
        content,
        validator.validateField("_chemical_oxdiff_formula", 2),
        "fix_embedded_prefix"
      );
      expect(result.ok ? result.value.content : null).toBe("data_x\n_chemical.oxdiff_formula C6");
    });

    it("允许前缀时优先嵌入前缀，文档不变", async () => {
      const content = "data_x\n_chemical_oxdiff_formula C6";
      const result = await validator.applyFieldAction(
        content,
        validator.validateField("_chemical_oxdiff_formula"),
        "allow_prefix"
      );
      expect(result.ok ? result.value : null).toEqual({ content, changes: [] });
      expect(preferences.values.allowedPrefixes).toEqual(["oxdiff"]);
    });

    it("忽略与允许字段", async () => {
      const ignored = await validator.applyFieldAction("x", validator.validateField("_foo_bar"), "ignore_session");
      expect(ignored.ok).toBe(true);
      expect(validator.validateField("_foo_bar").category).toBe("user_allowed");

      const allowed = await validator.applyFieldAction("x", validator.validateField("_baz_qux"), "allow_field");
      expect(allowed.ok).toBe(true);
      expect(preferences.values.allowedFields).toEqual(["_baz_qux"]);
    });

    it("缺少现代写法时返回错误", async () => {
      const result = await validator.applyFieldAction("x", validator.validateField("_foo_bar"), "replace_modern");
      expect(result.ok ? null : result.error.code).toBe("E101_INVALID_INPUT");
    });
  });
});
