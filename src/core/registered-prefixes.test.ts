/**
 * PrefixRegistry 单元测试
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { PrefixRegistry, parsePrefixTable } from "./registered-prefixes";
import { FileStorage, USER_PREFIXES_FILE } from "../data/file-storage";
import { cleanupTempDir, createTempDir, createTestLogger, logEvents } from "../test-utils";

describe("PrefixRegistry 内置前缀表", () => {
  const registry = new PrefixRegistry();

  it("提取前缀段", () => {
    expect(registry.getPrefixFromField("_shelx_res_file")).toBe("shelx");
    expect(registry.getPrefixFromField("_diffrn.ambient_temperature")).toBe("diffrn");
    expect(registry.getPrefixFromField("_pd_phase.name")).toBe("pd");
    expect(registry.getPrefixFromField("_cell")).toBeNull();
    expect(registry.getPrefixFromField("_")).toBeNull();
  });

  it("判断已注册前缀（大小写不敏感）", () => {
    expect(registry.isRegisteredPrefix("_olex2_refinement_flags")).toBe(true);
    expect(registry.isRegisteredPrefix("_SHELX_res_file")).toBe(true);
    expect(registry.isRegisteredPrefix("_mylab_thing")).toBe(false);
    expect(registry.isPrefixRegistered("CCDC")).toBe(true);
  });

  it("前缀说明", () => {
    expect(registry.getPrefixInfo("cod")).toBe("Crystallography Open Database");
    expect(registry.getPrefixInfo("nope")).toBeNull();
    expect(registry.getPrefixInfo("")).toBeNull();
  });

  it("建议词典：注册前缀优先，其次类别模式", () => {
    expect(registry.suggestDictionaryForPrefix("gsas")).toBe("cif_pow.dic");
    expect(registry.suggestDictionaryForPrefix("JANA")).toBe("cif_ms.dic");
    expect(registry.suggestDictionaryForPrefix("pd_")).toBe("cif_pow.dic");
    expect(registry.suggestDictionaryForPrefix("PD_")).toBe("cif_pow.dic");
    expect(registry.suggestDictionaryForPrefix("pd")).toBe("cif_pow.dic");
    expect(registry.suggestDictionaryForPrefix("magnetism")).toBe("cif_mag.dic");
    expect(registry.suggestDictionaryForPrefix("olex2")).toBeNull();
    expect(registry.suggestDictionaryForPrefix("")).toBeNull();
  });

  it("注册前缀按字母排序", () => {
    const prefixes = registry.getRegisteredPrefixes();
    expect(prefixes).toEqual([...prefixes].sort());
    expect(prefixes).toContain("iucr");
    expect(registry.getSource()).toBe("bundled");
  });
});

describe("parsePrefixTable", () => {
  it("补全缺省字段", () => {
    expect(parsePrefixTable({ prefixes: { lab: { description: "Test lab" } } })).toEqual({
      prefixes: { lab: { description: "Test lab", suggestedDictionary: null } },
      categoryDictionarySuggestions: {},
    });
  });

  it("结构不符时返回 null", () => {
    expect(parsePrefixTable(null)).toBeNull();
    expect(parsePrefixTable({ prefixes: [] })).toBeNull();
    expect(parsePrefixTable({ prefixes: { lab: { description: 1 } } })).toBeNull();
    expect(parsePrefixTable({ prefixes: {}, categoryDictionarySuggestions: { pd_: 3 } })).toBeNull();
  });
});

describe("PrefixRegistry.load", () => {
  let tempDir: string;
  let storage: FileStorage;

  beforeEach(() => {
    tempDir = createTempDir("prefixes");
    storage = new FileStorage({ dataDir: tempDir });
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it("没有用户文件时使用内置表", async () => {
    const registry = await PrefixRegistry.load(storage, createTestLogger());
    expect(registry.getSource()).toBe("bundled");
    expect(registry.isPrefixRegistered("shelx")).toBe(true);
  });

  it("用户文件有效时整体替换内置表", async () => {
    const table = {
      prefixes: { mylab: { description: "Test lab", suggestedDictionary: "cif_test.dic" } },
      categoryDictionarySuggestions: { tst_: "cif_tst.dic" },
    };
    fs.writeFileSync(path.join(tempDir, USER_PREFIXES_FILE), JSON.stringify(table));
    const logger = createTestLogger();

    const registry = await PrefixRegistry.load(storage, logger);
    expect(registry.getSource()).toBe(path.join(path.resolve(tempDir), USER_PREFIXES_FILE));
    expect(registry.getRegisteredPrefixes()).toEqual(["mylab"]);
    expect(registry.isPrefixRegistered("shelx")).toBe(false);
    expect(registry.suggestDictionaryForPrefix("tst")).toBe("cif_tst.dic");
    expect(logEvents(logger)).toContain("PREFIX_TABLE_LOADED");
  });

  it("用户文件结构无效时回退", async () => {
    fs.writeFileSync(path.join(tempDir, USER_PREFIXES_FILE), JSON.stringify({ prefixes: "none" }));
    const logger = createTestLogger();

    const registry = await PrefixRegistry.load(storage, logger);
    expect(registry.getSource()).toBe("bundled");
    expect(logEvents(logger)).toContain("PREFIX_TABLE_FALLBACK");
  });

  it("用户文件不是 JSON 时回退", async () => {
    fs.writeFileSync(path.join(tempDir, USER_PREFIXES_FILE), "{ not json");
    const logger = createTestLogger();

    const registry = await PrefixRegistry.load(storage, logger);
    expect(registry.getSource()).toBe("bundled");
    expect(logEvents(logger)).toEqual(["PREFIX_TABLE_FALLBACK"]);
  });
});
